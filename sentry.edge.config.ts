/**
 * Sentry Edge Configuration
 *
 * Used by the CORS middleware, which runs on the edge runtime.
 */

import * as Sentry from "@sentry/nextjs";

Sentry.init({
  dsn: process.env.SENTRY_DSN,
  environment: process.env.NODE_ENV,
  tracesSampleRate: process.env.NODE_ENV === "production" ? 0.2 : 1.0,
  enabled: Boolean(process.env.SENTRY_DSN),
});
