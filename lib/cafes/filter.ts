/**
 * Cafe filtering
 *
 * Linear scan over an already-loaded list. Used by the listing endpoint and
 * by the browsing page, which filters the payload it fetched once.
 */

import type { CafeFilters, CafeResponse } from "@/types/cafe";

type FilterableCafe = Pick<CafeResponse, "city" | "bestFor" | "alsoGoodFor">;

function clean(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Read filters from query parameters. `alsoGoodFor` may be repeated and/or
 * comma-separated; blank values are ignored.
 */
export function parseCafeFilters(searchParams: URLSearchParams): CafeFilters {
  const filters: CafeFilters = {};

  const city = clean(searchParams.get("city"));
  if (city) filters.city = city;

  const bestFor = clean(searchParams.get("bestFor"));
  if (bestFor) filters.bestFor = bestFor;

  const alsoGoodFor = Array.from(
    new Set(
      searchParams
        .getAll("alsoGoodFor")
        .flatMap((value) => value.split(","))
        .map((value) => value.trim())
        .filter(Boolean)
    )
  );
  if (alsoGoodFor.length > 0) filters.alsoGoodFor = alsoGoodFor;

  return filters;
}

/**
 * Category names a filter refers to, without duplicates
 */
export function referencedCategories(filters: CafeFilters): string[] {
  const names = new Set<string>();
  if (filters.bestFor) names.add(filters.bestFor);
  for (const name of filters.alsoGoodFor ?? []) names.add(name);
  return Array.from(names);
}

export function hasActiveFilters(filters: CafeFilters): boolean {
  return Boolean(filters.city || filters.bestFor || filters.alsoGoodFor?.length);
}

export interface FilterOptions {
  /**
   * "contains" (default) is a case-insensitive substring match, used for
   * typed queries. "exact" suits values picked from `listCities`.
   */
  cityMatch?: "contains" | "exact";
}

/**
 * Narrow cafes by filters. bestFor is an exact match on the primary
 * category, and alsoGoodFor matches cafes listing at least one of the given
 * additional categories.
 */
export function filterCafes<T extends FilterableCafe>(
  cafes: T[],
  filters: CafeFilters,
  { cityMatch = "contains" }: FilterOptions = {}
): T[] {
  if (!hasActiveFilters(filters)) {
    return cafes;
  }

  const city = filters.city?.toLowerCase();
  const wanted = filters.alsoGoodFor ?? [];

  return cafes.filter((cafe) => {
    if (city) {
      const cafeCity = cafe.city.toLowerCase();
      if (cityMatch === "exact" ? cafeCity !== city : !cafeCity.includes(city)) {
        return false;
      }
    }
    if (filters.bestFor && cafe.bestFor !== filters.bestFor) {
      return false;
    }
    if (wanted.length > 0 && !wanted.some((name) => cafe.alsoGoodFor.includes(name))) {
      return false;
    }
    return true;
  });
}

/**
 * Distinct cities, sorted, for the city dropdown
 */
export function listCities(cafes: Pick<CafeResponse, "city">[]): string[] {
  return Array.from(new Set(cafes.map((cafe) => cafe.city))).sort((a, b) => a.localeCompare(b));
}
