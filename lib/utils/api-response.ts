/**
 * JSON response helpers. Successful bodies are `{ success, data, meta }`,
 * failures are `{ error, code, details? }`.
 */

import { NextResponse } from "next/server";

export interface SuccessResponse<T> {
  success: true;
  data: T;
  meta?: ResponseMeta;
}

export interface ErrorResponse {
  error: string;
  code: string;
  details?: unknown;
}

export interface ResponseMeta {
  timestamp?: string;
  total?: number;
}

function envelope<T>(data: T, status: number, meta?: ResponseMeta): NextResponse<SuccessResponse<T>> {
  return NextResponse.json(
    { success: true, data, meta: { timestamp: new Date().toISOString(), ...meta } },
    { status }
  );
}

export function success<T>(data: T, meta?: ResponseMeta): NextResponse<SuccessResponse<T>> {
  return envelope(data, 200, meta);
}

export function created<T>(data: T, meta?: ResponseMeta): NextResponse<SuccessResponse<T>> {
  return envelope(data, 201, meta);
}

export function error(
  message: string,
  code: string,
  status: number = 500,
  details?: unknown
): NextResponse<ErrorResponse> {
  return NextResponse.json(
    { error: message, code, ...(details !== undefined && { details }) },
    { status }
  );
}

/** 429 with Retry-After in seconds */
export function rateLimit(
  message: string = "Too many requests",
  retryAfter?: number
): NextResponse<ErrorResponse> {
  const response = error(message, "RATE_LIMIT_EXCEEDED", 429);
  if (retryAfter) {
    response.headers.set("Retry-After", retryAfter.toString());
  }
  return response;
}

export interface CorsOptions {
  origin: string;
  methods?: string[];
  headers?: string[];
  credentials?: boolean;
}

export function withCORS<R extends Response>(response: R, options: CorsOptions): R {
  const {
    origin,
    methods = ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
    headers = ["Content-Type", "Authorization"],
    credentials = false,
  } = options;

  response.headers.set("Access-Control-Allow-Origin", origin);
  response.headers.set("Access-Control-Allow-Methods", methods.join(", "));
  response.headers.set("Access-Control-Allow-Headers", headers.join(", "));
  response.headers.append("Vary", "Origin");
  if (credentials) {
    response.headers.set("Access-Control-Allow-Credentials", "true");
  }
  return response;
}
