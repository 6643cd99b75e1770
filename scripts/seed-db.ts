/**
 * Seed the database with the category list, the starter cafes and,
 * when ADMIN_EMAIL / ADMIN_PASSWORD are set, an administrator account.
 *
 * Usage: npm run db:seed
 */

import categories from "@/data/categories.json";
import cafes from "@/data/cafes.json";
import { env, features, isProd } from "@/lib/config/env";
import { closeDataSource, getDataSource } from "@/lib/db";
import { findUserByEmail, registerUser } from "@/lib/services/auth";
import { seedDatabase } from "@/lib/services/seed";
import { logger, toError } from "@/lib/utils/logger";

async function seedAdmin(): Promise<void> {
  if (!features.hasSeedAdmin || !env.ADMIN_EMAIL || !env.ADMIN_PASSWORD) {
    logger.info("ADMIN_EMAIL / ADMIN_PASSWORD not set, skipping admin account");
    return;
  }

  if (await findUserByEmail(env.ADMIN_EMAIL)) {
    logger.info("Admin account already exists", { email: env.ADMIN_EMAIL });
    return;
  }

  await registerUser({ email: env.ADMIN_EMAIL, password: env.ADMIN_PASSWORD, isSuperuser: true });
  logger.info("Admin account created", { email: env.ADMIN_EMAIL });
}

async function main() {
  // Prevent accidental seeding in production
  if (isProd && process.env.ALLOW_SEED_IN_PRODUCTION !== "true") {
    throw new Error("Seed script cannot run in production without ALLOW_SEED_IN_PRODUCTION=true");
  }

  const dataSource = await getDataSource();
  const stats = await seedDatabase(dataSource, { categories, cafes });
  await seedAdmin();

  logger.info("Seed complete", { ...stats });
}

main()
  .catch((error: unknown) => {
    logger.fatal("Seed failed", toError(error));
    process.exitCode = 1;
  })
  .finally(async () => {
    await closeDataSource();
  });
