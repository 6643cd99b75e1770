/**
 * Database Seeding
 *
 * Idempotent upsert of the category list and the starter cafes. Re-running
 * it updates changed cafes and reconciles their category links instead of
 * duplicating rows.
 */

import type { DataSource, EntityManager } from "typeorm";
import { Cafe, CafeCategory, Category } from "@/lib/entities";
import { ensureCategories } from "@/lib/services/categories";
import { logger } from "@/lib/utils/logger";
import { cafeInputSchema, type CafeInput } from "@/lib/validations/cafe";

const log = logger.child({ service: "seed" });

export interface SeedData {
  categories: string[];
  cafes: unknown[];
}

export interface SeedStats {
  categoriesCreated: number;
  cafesCreated: number;
  cafesUpdated: number;
  cafesSkipped: number;
  linksAdded: number;
  linksUpdated: number;
  linksRemoved: number;
}

const UPDATABLE_FIELDS = ["address", "openingHours", "description", "imageUrl"] as const;

function describeRecord(record: unknown): string {
  if (record && typeof record === "object" && "name" in record && typeof record.name === "string") {
    return record.name;
  }
  return "<unnamed>";
}

function validateRecord(record: unknown, categoryIds: Map<string, number>): CafeInput | null {
  const parsed = cafeInputSchema.safeParse(record);
  if (!parsed.success) {
    log.warn("Skipping invalid cafe record", {
      cafe: describeRecord(record),
      issues: parsed.error.errors.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
    return null;
  }

  const unknown = [parsed.data.bestFor, ...parsed.data.alsoGoodFor].filter((name) => !categoryIds.has(name));
  if (unknown.length > 0) {
    log.warn("Skipping cafe with unknown categories", { cafe: parsed.data.name, categories: unknown });
    return null;
  }

  return parsed.data;
}

function desiredLinks(cafe: CafeInput, categoryIds: Map<string, number>): Map<number, boolean> {
  const desired = new Map<number, boolean>();
  for (const name of [cafe.bestFor, ...cafe.alsoGoodFor]) {
    const id = categoryIds.get(name);
    if (id !== undefined) {
      desired.set(id, name === cafe.bestFor);
    }
  }
  return desired;
}

async function reconcileLinks(
  manager: EntityManager,
  cafeId: number,
  desired: Map<number, boolean>,
  stats: SeedStats
): Promise<void> {
  const repository = manager.getRepository(CafeCategory);
  const current = await repository.findBy({ cafeId });
  const currentByCategory = new Map(current.map((link) => [link.categoryId, link]));

  for (const [categoryId, isBest] of desired) {
    const link = currentByCategory.get(categoryId);
    if (!link) {
      await repository.save(repository.create({ cafeId, categoryId, isBest }));
      stats.linksAdded++;
    } else if (link.isBest !== isBest) {
      link.isBest = isBest;
      await repository.save(link);
      stats.linksUpdated++;
    }
  }

  const stale = current.filter((link) => !desired.has(link.categoryId));
  if (stale.length > 0) {
    await repository.remove(stale);
    stats.linksRemoved += stale.length;
  }
}

export async function seedDatabase(dataSource: DataSource, data: SeedData): Promise<SeedStats> {
  const stats: SeedStats = {
    categoriesCreated: 0,
    cafesCreated: 0,
    cafesUpdated: 0,
    cafesSkipped: 0,
    linksAdded: 0,
    linksUpdated: 0,
    linksRemoved: 0,
  };

  await dataSource.transaction(async (manager) => {
    stats.categoriesCreated = (await ensureCategories(manager, data.categories)).length;

    const categoryIds = new Map(
      (await manager.getRepository(Category).find()).map((category) => [category.name, category.id])
    );
    const cafes = manager.getRepository(Cafe);

    for (const record of data.cafes) {
      const input = validateRecord(record, categoryIds);
      if (!input) {
        stats.cafesSkipped++;
        continue;
      }

      let cafe = await cafes.findOneBy({ name: input.name, city: input.city });

      const fields = {
        address: input.address,
        openingHours: input.openingHours,
        description: input.description,
        imageUrl: input.imageUrl,
      };

      if (cafe) {
        const existing = cafe;
        if (UPDATABLE_FIELDS.some((field) => existing[field] !== fields[field])) {
          cafe = await cafes.save(cafes.merge(existing, fields));
          stats.cafesUpdated++;
        }
      } else {
        cafe = await cafes.save(cafes.create({ name: input.name, city: input.city, ...fields }));
        stats.cafesCreated++;
      }

      await reconcileLinks(manager, cafe.id, desiredLinks(input, categoryIds), stats);
      log.debug("Processed cafe", { cafe: input.name, city: input.city, bestFor: input.bestFor });
    }
  });

  log.info("Database seeded", { ...stats });
  return stats;
}
