import { NextResponse } from "next/server";
import { getDataSource } from "@/lib/db";
import { logger, toError } from "@/lib/utils/logger";

export const dynamic = "force-dynamic";

/**
 * Health Check Endpoint
 *
 * Verifies the database answers a trivial query.
 */
export async function GET() {
  const startTime = Date.now();

  try {
    const dataSource = await getDataSource();
    await dataSource.query("SELECT 1");

    return NextResponse.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || "0.1.0",
      uptime: process.uptime(),
      latency: Date.now() - startTime,
    });
  } catch (error) {
    logger.error("Health check failed", toError(error));

    return NextResponse.json(
      {
        status: "unhealthy",
        timestamp: new Date().toISOString(),
        error: error instanceof Error ? error.message : "Unknown error",
      },
      { status: 503 }
    );
  }
}
