/**
 * Settlement routes.
 *
 * POST /api/v1/settlements — Record a payment between two people
 * GET  /api/v1/settlements — List recorded settlements in insertion order
 */

import { randomUUID } from "node:crypto";
import { Hono } from "hono";
import type { Settlement } from "@tally/types";
import type { AppEnv } from "../types/api-contract.js";
import { CreateSettlementSchema } from "../types/dto.js";
import type { CreateSettlementDto } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function toSettlement(body: CreateSettlementDto, now: Date = new Date()): Settlement {
  return {
    id: body.id ?? randomUUID(),
    payer: body.payer,
    payee: body.payee,
    amount: body.amount,
    description: body.description,
    date: body.date ?? now.toISOString(),
    notes: body.notes,
  };
}

export function createSettlementRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateSettlementSchema), (c) => {
    const service = c.get("service");
    const record = service.addSettlement(toSettlement(c.get("validatedBody")));
    return c.json({ data: record }, 201);
  });

  routes.get("/", (c) => {
    const service = c.get("service");
    return c.json({ data: service.listSettlements() });
  });

  return routes;
}
