/**
 * Cafe Types
 *
 * Wire shapes shared by the API routes and the browser pages.
 */

export interface CafeResponse {
  id: number;
  name: string;
  city: string;
  address: string | null;
  openingHours: string | null;
  description: string;
  imageUrl: string | null;
  /** Primary category */
  bestFor: string | null;
  /** Additional categories, sorted by name */
  alsoGoodFor: string[];
}

export interface CategoryResponse {
  id: number;
  name: string;
}

export interface CafeFilters {
  city?: string;
  bestFor?: string;
  alsoGoodFor?: string[];
}

export interface AccessTokenResponse {
  accessToken: string;
  tokenType: "bearer";
  /** Lifetime in seconds */
  expiresIn: number;
}

export interface UserResponse {
  id: number;
  email: string;
  isActive: boolean;
  isSuperuser: boolean;
}

export interface ApiSuccess<T> {
  success: true;
  data: T;
}

export interface ApiError {
  error: string;
  code: string;
  details?: unknown;
}
