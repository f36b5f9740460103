/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (1:1 backing invariant holds)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { TokenService } from "../services/token-service.js";

export function createHealthRoutes(service: TokenService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const report = service.backing();

    return c.json(
      {
        status: report.backed ? "ready" : "not_ready",
        backing: {
          totalSupply: report.totalSupply.toString(),
          balanceSum: report.balanceSum.toString(),
          custody: report.custody.toString(),
          held: report.held.toString(),
          backed: report.backed,
        },
        timestamp: new Date().toISOString(),
      },
      report.backed ? 200 : 503,
    );
  });

  return routes;
}
