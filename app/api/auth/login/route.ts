import { NextRequest } from "next/server";
import { z } from "zod";
import { loginRateLimit } from "@/lib/middleware/rate-limit";
import { authenticate, issueAccessToken } from "@/lib/services/auth";
import { success } from "@/lib/utils/api-response";
import { withErrorHandling } from "@/lib/utils/errors";
import { logger } from "@/lib/utils/logger";
import { readJson } from "@/lib/utils/request";

const loginSchema = z.object({
  email: z.string().trim().min(1, "Email is required"),
  password: z.string().min(1, "Password is required"),
});

async function readCredentials(request: NextRequest): Promise<unknown> {
  const contentType = request.headers.get("content-type") ?? "";

  // OAuth2-style password form: username + password
  if (
    contentType.includes("application/x-www-form-urlencoded") ||
    contentType.includes("multipart/form-data")
  ) {
    const form = await request.formData();
    return {
      email: form.get("username") ?? form.get("email"),
      password: form.get("password"),
    };
  }

  return readJson(request);
}

/**
 * POST /api/auth/login
 * Exchange credentials for a bearer token
 */
export const POST = withErrorHandling(async (request: NextRequest) => {
  const rateLimited = await loginRateLimit(request);
  if (rateLimited) return rateLimited;

  const { email, password } = loginSchema.parse(await readCredentials(request));
  const user = await authenticate(email, password);
  const token = await issueAccessToken(user);

  logger.info("[Auth] Admin logged in", { userId: user.id });

  const response = success(token);
  response.headers.set("Cache-Control", "no-store");
  return response;
});
