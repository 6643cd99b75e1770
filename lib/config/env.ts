/**
 * Environment Configuration and Validation
 *
 * Centralized environment variable management with validation.
 * Fails fast on startup if required variables are missing.
 */

import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false"])
  .default("false")
  .transform((val) => val === "true");

// Environment schema with validation
const envSchema = z.object({
  // Node Environment
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),

  // Database (SQLite file, ":memory:" for an in-process store)
  DATABASE_PATH: z.string().min(1).default("data/cafes.db"),
  DATABASE_LOGGING: booleanFlag,

  // Authentication
  SECRET_KEY: z.string().min(16, "SECRET_KEY must be at least 16 characters"),
  JWT_ALGORITHM: z.enum(["HS256", "HS384", "HS512"]).default("HS256"),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(60),
  ALLOW_REGISTRATION: booleanFlag,
  LOGIN_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(10),

  // Seeded admin account
  ADMIN_EMAIL: z.string().email("Invalid ADMIN_EMAIL").optional(),
  ADMIN_PASSWORD: z.string().min(8, "ADMIN_PASSWORD must be at least 8 characters").optional(),

  // CORS Configuration
  CORS_ORIGINS: z.string().optional(), // Comma-separated list of allowed origins

  // Monitoring (Sentry)
  SENTRY_DSN: z.string().url("Invalid SENTRY_DSN").optional(),
});

// Parse and validate environment variables
function validateEnv() {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => {
        const path = issue.path.join(".");
        return `  - ${path}: ${issue.message}`;
      });

      console.error("Environment validation failed:\n");
      console.error(issues.join("\n"));
      console.error("\nPlease check your .env file and ensure all required variables are set.");

      throw new Error("Invalid environment configuration");
    }
    throw error;
  }
}

// Export validated environment
export const env = validateEnv();


export const corsOrigins: string[] = (env.CORS_ORIGINS ?? "")
  .split(",")
  .map((origin) => origin.trim())
  .filter(Boolean);

// Helper to check if feature is enabled
export const features = {
  registration: env.ALLOW_REGISTRATION,
  hasSeedAdmin: Boolean(env.ADMIN_EMAIL && env.ADMIN_PASSWORD),
} as const;

// Helper to check if running in production
export const isProd = env.NODE_ENV === "production";
export const isDev = env.NODE_ENV === "development";
export const isTest = env.NODE_ENV === "test";
