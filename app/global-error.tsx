"use client";

/**
 * Root error boundary. Reports the crash to Sentry and offers a retry.
 */

import * as Sentry from "@sentry/nextjs";
import { useEffect } from "react";
import { AlertTriangle, RefreshCw } from "lucide-react";
import { Button } from "@/components/ui/button";
import "./globals.css";

export default function GlobalError({
  error,
  reset,
}: {
  error: Error & { digest?: string };
  reset: () => void;
}) {
  useEffect(() => {
    Sentry.captureException(error, {
      tags: { errorBoundary: "global" },
      extra: { digest: error.digest },
    });
  }, [error]);

  return (
    <html lang="en">
      <body className="bg-background text-text-primary">
        <main className="flex min-h-screen items-center justify-center p-4">
          <div className="w-full max-w-md rounded-lg border border-border bg-background-secondary p-8 text-center">
            <AlertTriangle className="mx-auto mb-6 h-12 w-12 text-error" />
            <h1 className="mb-2 text-2xl font-semibold">Something went wrong</h1>
            <p className="mb-6 text-text-secondary">The page could not be displayed.</p>

            {error.digest && (
              <p className="mb-6 font-mono text-xs text-text-tertiary">Error ID: {error.digest}</p>
            )}

            <Button onClick={reset}>
              <RefreshCw className="h-4 w-4" />
              Try again
            </Button>
          </div>
        </main>
      </body>
    </html>
  );
}
