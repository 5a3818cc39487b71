/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (history replays to the same balance table)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { TallyService } from "../services/tally-service.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(service: TallyService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    let history: SubsystemStatus;
    try {
      const result = service.verify();
      history = result.verdict === "PASS"
        ? { status: "ok" }
        : { status: "down", detail: `replay=${result.verdict}, discrepancies=${result.discrepancies.length}` };
    } catch (err) {
      history = {
        status: "down",
        detail: err instanceof Error ? err.message : String(err),
      };
    }

    const ready = history.status === "ok";
    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        subsystems: { history },
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
