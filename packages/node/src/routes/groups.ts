/**
 * Group routes.
 *
 * POST /api/v1/groups — Create a named group
 * GET  /api/v1/groups — List groups
 */

import { randomUUID } from "node:crypto";
import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreateGroupSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createGroupRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateGroupSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");
    const group = service.addGroup({ id: body.id ?? randomUUID(), name: body.name });
    return c.json({ data: group }, 201);
  });

  routes.get("/", (c) => {
    const service = c.get("service");
    return c.json({ data: service.listGroups() });
  });

  return routes;
}
