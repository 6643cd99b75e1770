/**
 * Cafe Service
 *
 * Row-level CRUD for cafes and their category links. Every write runs in a
 * single transaction so a cafe is never stored without its categories.
 */

import { Not, type EntityManager } from "typeorm";
import { getDataSource } from "@/lib/db";
import { Cafe, CafeCategory, type Category } from "@/lib/entities";
import { filterCafes, referencedCategories } from "@/lib/cafes/filter";
import { resolveCategories } from "@/lib/services/categories";
import { assertExists, ConflictError } from "@/lib/utils/errors";
import { logger } from "@/lib/utils/logger";
import type { CafeInput } from "@/lib/validations/cafe";
import type { CafeFilters, CafeResponse } from "@/types/cafe";

const log = logger.child({ service: "cafes" });

const WITH_CATEGORIES = { categoryLinks: { category: true } } as const;
const LISTING_ORDER = { name: "ASC", id: "ASC" } as const;

/**
 * Flatten a cafe and its loaded category links into the wire shape
 */
export function toCafeResponse(cafe: Cafe): CafeResponse {
  const links = cafe.categoryLinks ?? [];
  const best = links.find((link) => link.isBest);

  return {
    id: cafe.id,
    name: cafe.name,
    city: cafe.city,
    address: cafe.address,
    openingHours: cafe.openingHours,
    description: cafe.description,
    imageUrl: cafe.imageUrl,
    bestFor: best ? best.category.name : null,
    alsoGoodFor: links
      .filter((link) => !link.isBest)
      .map((link) => link.category.name)
      .sort((a, b) => a.localeCompare(b)),
  };
}

/**
 * Every cafe, ordered by name then id
 */
export async function loadAllCafes(manager?: EntityManager): Promise<CafeResponse[]> {
  const em = manager ?? (await getDataSource()).manager;
  const cafes = await em.getRepository(Cafe).find({
    relations: WITH_CATEGORIES,
    order: LISTING_ORDER,
  });
  return cafes.map(toCafeResponse);
}

async function loadCafe(manager: EntityManager, id: number): Promise<CafeResponse> {
  const cafe = await manager.getRepository(Cafe).findOne({
    where: { id },
    relations: WITH_CATEGORIES,
  });
  assertExists(cafe, "Cafe", id);
  return toCafeResponse(cafe);
}

async function assertUniqueNameCity(
  manager: EntityManager,
  input: Pick<CafeInput, "name" | "city">,
  excludeId?: number
): Promise<void> {
  const clash = await manager.getRepository(Cafe).findOne({
    where: {
      name: input.name,
      city: input.city,
      ...(excludeId !== undefined && { id: Not(excludeId) }),
    },
  });

  if (clash) {
    throw new ConflictError("Cafe with this name and city already exists", {
      name: input.name,
      city: input.city,
    });
  }
}

async function replaceLinks(
  manager: EntityManager,
  cafeId: number,
  input: Pick<CafeInput, "bestFor" | "alsoGoodFor">,
  categories: Map<string, Category>
): Promise<void> {
  const repository = manager.getRepository(CafeCategory);
  await repository.delete({ cafeId });

  const links = [input.bestFor, ...input.alsoGoodFor].map((name) => {
    const category = categories.get(name);
    assertExists(category, "Category", name);
    return repository.create({
      cafeId,
      categoryId: category.id,
      isBest: name === input.bestFor,
    });
  });

  await repository.save(links);
}

function cafeFields(input: CafeInput) {
  return {
    name: input.name,
    city: input.city,
    address: input.address,
    openingHours: input.openingHours,
    description: input.description,
    imageUrl: input.imageUrl,
  };
}

// ============================================================================
// Operations
// ============================================================================

/**
 * List cafes narrowed by the given filters. Filters naming unknown
 * categories are rejected.
 */
export async function listCafes(filters: CafeFilters = {}): Promise<CafeResponse[]> {
  const dataSource = await getDataSource();
  await resolveCategories(dataSource.manager, referencedCategories(filters));

  const cafes = await loadAllCafes(dataSource.manager);
  return filterCafes(cafes, filters);
}

export async function getCafe(id: number): Promise<CafeResponse> {
  const dataSource = await getDataSource();
  return loadCafe(dataSource.manager, id);
}

export async function createCafe(input: CafeInput): Promise<CafeResponse> {
  const dataSource = await getDataSource();

  const cafe = await dataSource.transaction(async (manager) => {
    const categories = await resolveCategories(manager, [input.bestFor, ...input.alsoGoodFor]);
    await assertUniqueNameCity(manager, input);

    const repository = manager.getRepository(Cafe);
    const saved = await repository.save(repository.create(cafeFields(input)));
    await replaceLinks(manager, saved.id, input, categories);

    return loadCafe(manager, saved.id);
  });

  log.info("Cafe created", { cafeId: cafe.id, name: cafe.name, city: cafe.city });
  return cafe;
}

/**
 * Replace every field and category of an existing cafe
 */
export async function updateCafe(id: number, input: CafeInput): Promise<CafeResponse> {
  const dataSource = await getDataSource();

  const cafe = await dataSource.transaction(async (manager) => {
    const repository = manager.getRepository(Cafe);
    const existing = await repository.findOneBy({ id });
    assertExists(existing, "Cafe", id);

    const categories = await resolveCategories(manager, [input.bestFor, ...input.alsoGoodFor]);
    await assertUniqueNameCity(manager, input, id);

    await repository.save(repository.merge(existing, cafeFields(input)));
    await replaceLinks(manager, id, input, categories);

    return loadCafe(manager, id);
  });

  log.info("Cafe updated", { cafeId: id });
  return cafe;
}

export async function deleteCafe(id: number): Promise<{ id: number }> {
  const dataSource = await getDataSource();

  await dataSource.transaction(async (manager) => {
    const existing = await manager.getRepository(Cafe).findOneBy({ id });
    assertExists(existing, "Cafe", id);

    await manager.getRepository(CafeCategory).delete({ cafeId: id });
    await manager.getRepository(Cafe).delete({ id });
  });

  log.info("Cafe deleted", { cafeId: id });
  return { id };
}
