/**
 * API Client
 *
 * Browser-side wrapper over the JSON API. Unwraps the `{ success, data }`
 * envelope and turns error bodies into ApiClientError.
 */

import type {
  AccessTokenResponse,
  ApiError,
  ApiSuccess,
  CafeResponse,
  CategoryResponse,
  UserResponse,
} from "@/types/cafe";

const API_BASE = "/api";

export class ApiClientError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly code?: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = "ApiClientError";
  }
}

export interface CafePayload {
  name: string;
  city: string;
  address: string;
  openingHours: string;
  description: string;
  imageUrl: string;
  bestFor: string;
  alsoGoodFor: string[];
}

function isApiError(body: unknown): body is ApiError {
  return typeof body === "object" && body !== null && "error" in body && typeof body.error === "string";
}

async function fetchApi<T>(endpoint: string, options: RequestInit & { token?: string } = {}): Promise<T> {
  const { token, headers, ...init } = options;

  const response = await fetch(`${API_BASE}${endpoint}`, {
    ...init,
    headers: {
      "Content-Type": "application/json",
      ...(token && { Authorization: `Bearer ${token}` }),
      ...headers,
    },
  });

  const body: ApiSuccess<T> | ApiError | null = await response.json().catch(() => null);

  if (!response.ok || body === null || isApiError(body)) {
    throw new ApiClientError(
      isApiError(body) ? body.error : `API Error: ${response.status}`,
      response.status,
      isApiError(body) ? body.code : undefined,
      isApiError(body) ? body.details : undefined
    );
  }

  return body.data;
}

// =============================================================================
// Public
// =============================================================================

export function fetchCafes(): Promise<CafeResponse[]> {
  return fetchApi("/cafes");
}

export function fetchCategories(): Promise<CategoryResponse[]> {
  return fetchApi("/categories");
}

export function fetchRecommendations(cafeId: number): Promise<CafeResponse[]> {
  return fetchApi(`/cafes/${cafeId}/recommend`);
}

// =============================================================================
// Admin
// =============================================================================

export function login(email: string, password: string): Promise<AccessTokenResponse> {
  return fetchApi("/auth/login", {
    method: "POST",
    body: JSON.stringify({ email, password }),
  });
}

export function fetchCurrentUser(token: string): Promise<UserResponse> {
  return fetchApi("/auth/me", { token });
}

export function createCafe(token: string, input: CafePayload): Promise<CafeResponse> {
  return fetchApi("/cafes", {
    method: "POST",
    body: JSON.stringify(input),
    token,
  });
}

export function updateCafe(token: string, id: number, input: CafePayload): Promise<CafeResponse> {
  return fetchApi(`/cafes/${id}`, {
    method: "PUT",
    body: JSON.stringify(input),
    token,
  });
}

export function deleteCafe(token: string, id: number): Promise<{ message: string; id: number }> {
  return fetchApi(`/cafes/${id}`, {
    method: "DELETE",
    token,
  });
}
