import { listCategories } from "@/lib/services/categories";
import { success } from "@/lib/utils/api-response";
import { withErrorHandling } from "@/lib/utils/errors";

export const dynamic = "force-dynamic";

/**
 * GET /api/categories
 */
export const GET = withErrorHandling(async () => {
  return success(await listCategories());
});
