/**
 * Authentication Middleware
 *
 * Guards admin API routes behind a bearer token issued by /api/auth/login.
 */

import { NextRequest, NextResponse } from "next/server";
import type { User } from "@/lib/entities";
import { verifyAccessToken } from "@/lib/services/auth";
import { AuthenticationError, withErrorHandling } from "@/lib/utils/errors";

/**
 * Second argument Next.js passes to route handlers
 */
export interface RouteContext<P extends Record<string, string> = Record<string, never>> {
  params: Promise<P>;
}

/**
 * Extract the token from an `Authorization: Bearer <token>` header
 */
export function getBearerToken(request: NextRequest): string | null {
  const header = request.headers.get("authorization");
  if (!header) {
    return null;
  }

  const [scheme, token, ...rest] = header.trim().split(/\s+/);
  if (scheme.toLowerCase() !== "bearer" || !token || rest.length > 0) {
    return null;
  }

  return token;
}

/**
 * Resolve the administrator making the request.
 * Throws AuthenticationError if the token is missing or invalid.
 */
export async function getAdminUser(request: NextRequest): Promise<User> {
  const token = getBearerToken(request);
  if (!token) {
    throw new AuthenticationError("Authentication required");
  }
  return verifyAccessToken(token);
}

/**
 * Wrap a route handler so it only runs for an authenticated administrator.
 * Authentication and handler errors are turned into JSON error responses.
 */
export function withAdmin<P extends Record<string, string> = Record<string, never>>(
  handler: (request: NextRequest, context: RouteContext<P>, user: User) => Promise<NextResponse>
) {
  return withErrorHandling(async (request: NextRequest, context: RouteContext<P>) => {
    const user = await getAdminUser(request);
    const response = await handler(request, context, user);
    response.headers.set("Cache-Control", "no-store");
    return response;
  });
}
