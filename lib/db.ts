/**
 * Database connection
 *
 * One shared TypeORM DataSource over SQLite. The schema is synchronised
 * from the entity definitions when the connection is first opened.
 */

import { DataSource } from "typeorm";
import { Cafe, CafeCategory, Category, User } from "@/lib/entities";
import { env } from "@/lib/config/env";
import { logger } from "@/lib/utils/logger";

export const entities = [Cafe, Category, CafeCategory, User];

let initializing: Promise<DataSource> | null = null;

export function createDataSource(database: string = env.DATABASE_PATH): DataSource {
  return new DataSource({
    type: "better-sqlite3",
    database,
    entities,
    synchronize: true,
    logging: env.DATABASE_LOGGING,
  });
}

/**
 * Get the shared, initialised DataSource
 */
export function getDataSource(): Promise<DataSource> {
  if (!initializing) {
    const dataSource = createDataSource();
    initializing = dataSource.initialize().then(
      (ds) => {
        logger.debug("Database connected", { database: env.DATABASE_PATH });
        return ds;
      },
      (error: unknown) => {
        initializing = null;
        throw error;
      }
    );
  }
  return initializing;
}

/**
 * Close the shared DataSource (call on shutdown and after test suites)
 */
export async function closeDataSource(): Promise<void> {
  if (!initializing) {
    return;
  }
  const pending = initializing;
  initializing = null;
  const dataSource = await pending;
  if (dataSource.isInitialized) {
    await dataSource.destroy();
  }
}

/**
 * Drop every table and recreate the schema
 */
export async function resetDatabase(): Promise<DataSource> {
  const dataSource = await getDataSource();
  await dataSource.synchronize(true);
  return dataSource;
}
