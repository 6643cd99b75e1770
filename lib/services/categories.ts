/**
 * Category Service
 *
 * Categories are a small fixed set loaded by the seed script; the API only
 * reads them.
 */

import { In, type EntityManager } from "typeorm";
import { getDataSource } from "@/lib/db";
import { Category } from "@/lib/entities";
import { ValidationError } from "@/lib/utils/errors";
import type { CategoryResponse } from "@/types/cafe";

export async function listCategories(): Promise<CategoryResponse[]> {
  const dataSource = await getDataSource();
  const categories = await dataSource.getRepository(Category).find({
    order: { name: "ASC" },
  });
  return categories.map(({ id, name }) => ({ id, name }));
}

/**
 * Look up categories by name. Throws a ValidationError naming every
 * unknown category, in the order they were requested.
 */
export async function resolveCategories(
  manager: EntityManager,
  names: string[]
): Promise<Map<string, Category>> {
  const unique = Array.from(new Set(names));
  if (unique.length === 0) {
    return new Map();
  }

  const found = await manager.getRepository(Category).find({
    where: { name: In(unique) },
  });
  const byName = new Map(found.map((category) => [category.name, category]));

  const missing = unique.filter((name) => !byName.has(name));
  if (missing.length > 0) {
    throw new ValidationError(`Categories do not exist: ${missing.join(", ")}`, { missing });
  }

  return byName;
}

/**
 * Insert any of the given category names that are not stored yet.
 * Returns the names that were created.
 */
export async function ensureCategories(manager: EntityManager, names: string[]): Promise<string[]> {
  const repository = manager.getRepository(Category);
  const existing = new Set((await repository.find()).map((category) => category.name));
  const toCreate = Array.from(new Set(names)).filter((name) => !existing.has(name));

  if (toCreate.length > 0) {
    await repository.save(toCreate.map((name) => repository.create({ name })));
  }

  return toCreate;
}
