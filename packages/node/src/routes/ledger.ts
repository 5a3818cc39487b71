/**
 * Ledger routes.
 *
 * GET /api/v1/ledger                       — Balance table snapshot and its hash
 * GET /api/v1/ledger/verify?expectedHash=  — Replay the history twice and compare
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { VerifyQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "../middleware/validate.js";

export function createLedgerRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");
    return c.json({ data: service.snapshot() });
  });

  // Divergence surfaces as REPLAY_DIVERGED (409) through the error handler
  routes.get("/verify", (c) => {
    const service = c.get("service");

    const queryResult = VerifyQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const hash = service.assertVerified(queryResult.data.expectedHash);
    return c.json({ data: { verdict: "PASS", hash } });
  });

  return routes;
}
