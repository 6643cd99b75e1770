import type { NextConfig } from "next";
import { withSentryConfig } from "@sentry/nextjs";

const nextConfig: NextConfig = {
  // Enable standalone output for Docker
  output: "standalone",

  // Native driver and decorator-based ORM stay outside the server bundle
  serverExternalPackages: ["typeorm", "better-sqlite3"],
};

export default withSentryConfig(nextConfig, {
  silent: !process.env.CI,
  // Source map upload only when an auth token is present
  sourcemaps: {
    disable: !process.env.SENTRY_AUTH_TOKEN,
  },
});
