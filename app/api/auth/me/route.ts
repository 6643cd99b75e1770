import { withAdmin } from "@/lib/middleware/auth";
import { toUserResponse } from "@/lib/services/auth";
import { success } from "@/lib/utils/api-response";

/**
 * GET /api/auth/me
 * The administrator the bearer token belongs to
 */
export const GET = withAdmin(async (_request, _context, user) => {
  return success(toUserResponse(user));
});
