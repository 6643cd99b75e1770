import { NextRequest } from "next/server";
import { parseCafeFilters } from "@/lib/cafes/filter";
import { withAdmin } from "@/lib/middleware/auth";
import { createCafe, listCafes } from "@/lib/services/cafes";
import { created, success } from "@/lib/utils/api-response";
import { withErrorHandling } from "@/lib/utils/errors";
import { logger } from "@/lib/utils/logger";
import { readJson } from "@/lib/utils/request";
import { cafeInputSchema } from "@/lib/validations/cafe";

export const dynamic = "force-dynamic";

/**
 * GET /api/cafes?city=&bestFor=&alsoGoodFor=
 * Public listing, optionally filtered
 */
export const GET = withErrorHandling(async (request: NextRequest) => {
  const filters = parseCafeFilters(request.nextUrl.searchParams);

  logger.debug("[Cafes] Listing cafes", { filters });

  const cafes = await listCafes(filters);
  return success(cafes, { total: cafes.length });
});

/**
 * POST /api/cafes
 * Create a cafe (admin only)
 */
export const POST = withAdmin(async (request, _context, user) => {
  const input = cafeInputSchema.parse(await readJson(request));
  const cafe = await createCafe(input);

  logger.info("[Cafes] Cafe created by admin", { cafeId: cafe.id, userId: user.id });
  return created(cafe);
});
