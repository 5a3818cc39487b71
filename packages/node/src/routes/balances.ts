/**
 * Balance routes.
 *
 * GET /api/v1/balances/:identity?asOf=  — Net position against each counterparty
 * GET /api/v1/dashboard/:identity       — Owed-by-me / owed-to-me totals
 *
 * Positive balance: the identity owes that counterparty.
 * Negative balance: the counterparty owes the identity.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { BalancesQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "../middleware/validate.js";

export function createBalanceRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/balances/:identity", (c) => {
    const service = c.get("service");
    const identity = c.req.param("identity");

    const queryResult = BalancesQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const { asOf } = queryResult.data;
    return c.json({
      data: {
        identity,
        asOf: asOf ?? null,
        balances: service.balancesFor(identity, asOf),
      },
    });
  });

  routes.get("/dashboard/:identity", (c) => {
    const service = c.get("service");
    const identity = c.req.param("identity");
    const [owedByMe, owedToMe] = service.dashboardTotals(identity);

    return c.json({ data: { identity, owedByMe, owedToMe } });
  });

  return routes;
}
