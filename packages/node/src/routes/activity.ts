/**
 * Activity feed route.
 *
 * GET /api/v1/activity?limit= — Expenses and settlements, newest first
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ActivityQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "../middleware/validate.js";

export function createActivityRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");

    const queryResult = ActivityQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    return c.json({ data: service.recentActivity(queryResult.data.limit) });
  });

  return routes;
}
