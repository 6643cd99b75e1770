import { NextRequest, NextResponse } from "next/server";
import { corsOrigins } from "@/lib/config/env";
import { withCORS } from "@/lib/utils/api-response";

/**
 * CORS for the JSON API. Origins listed in CORS_ORIGINS get the
 * Access-Control-Allow-* headers; preflight requests are answered here.
 */
export function middleware(request: NextRequest) {
  const origin = request.headers.get("origin");
  const allowedOrigin = origin !== null && corsOrigins.includes(origin) ? origin : null;

  const response =
    request.method === "OPTIONS" ? new NextResponse(null, { status: 204 }) : NextResponse.next();

  if (!allowedOrigin) {
    return response;
  }

  return withCORS(response, { origin: allowedOrigin, credentials: true });
}

export const config = {
  matcher: ["/api/:path*"],
};
