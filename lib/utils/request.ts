import { NextRequest } from "next/server";
import { ValidationError } from "./errors";

/**
 * Parse the request body as JSON. A missing or malformed body is a 400.
 */
export async function readJson(request: NextRequest): Promise<unknown> {
  try {
    return await request.json();
  } catch {
    throw new ValidationError("Request body must be valid JSON");
  }
}
