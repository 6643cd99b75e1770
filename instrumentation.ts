/**
 * Next.js Instrumentation
 *
 * Initializes Sentry for server-side error tracking.
 */

import * as Sentry from "@sentry/nextjs";

export async function register() {
  if (process.env.NEXT_RUNTIME === "nodejs") {
    await import("./sentry.server.config");
  }

  if (process.env.NEXT_RUNTIME === "edge") {
    await import("./sentry.edge.config");
  }
}

/**
 * Capture errors from nested React Server Components.
 */
export const onRequestError = Sentry.captureRequestError;
