import { NextRequest } from "next/server";
import { z } from "zod";
import { features } from "@/lib/config/env";
import { registerUser, toUserResponse } from "@/lib/services/auth";
import { created } from "@/lib/utils/api-response";
import { AuthorizationError, withErrorHandling } from "@/lib/utils/errors";
import { readJson } from "@/lib/utils/request";

const registerSchema = z.object({
  email: z.string().trim().email("Invalid email address"),
  password: z.string().min(8, "Password must be at least 8 characters"),
});

/**
 * POST /api/auth/register
 * Open only when ALLOW_REGISTRATION is set
 */
export const POST = withErrorHandling(async (request: NextRequest) => {
  if (!features.registration) {
    throw new AuthorizationError("Registration is disabled");
  }

  const input = registerSchema.parse(await readJson(request));
  const user = await registerUser(input);

  return created(toUserResponse(user));
});
