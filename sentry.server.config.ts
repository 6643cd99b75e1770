/**
 * Sentry Server Configuration
 *
 * Captures errors raised by API routes and server rendering.
 */

import * as Sentry from "@sentry/nextjs";

Sentry.init({
  dsn: process.env.SENTRY_DSN,

  environment: process.env.NODE_ENV,

  tracesSampleRate: process.env.NODE_ENV === "production" ? 0.2 : 1.0,

  // Only report when a DSN is configured
  enabled: Boolean(process.env.SENTRY_DSN),

  serverName: process.env.HOSTNAME || "cafes-directory",

  // Ignore expected errors
  ignoreErrors: [
    "NEXT_NOT_FOUND",
    "NEXT_REDIRECT",
    // Rate limiting and user input
    "Rate limit exceeded",
    "ZodError",
  ],

  beforeSend(event, hint) {
    const error = hint.originalException;
    if (error instanceof Error && error.name === "QueryFailedError") {
      event.tags = { ...event.tags, database: "sqlite" };
    }
    return event;
  },
});
