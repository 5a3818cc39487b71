/**
 * Expense routes.
 *
 * POST /api/v1/expenses — Record a shared expense
 * GET  /api/v1/expenses — List recorded expenses in insertion order
 */

import { randomUUID } from "node:crypto";
import { Hono } from "hono";
import { toParticipantWeights } from "@tally/ledger";
import type { Expense } from "@tally/types";
import type { AppEnv } from "../types/api-contract.js";
import { CreateExpenseSchema } from "../types/dto.js";
import type { CreateExpenseDto } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

/**
 * Map a validated request body to a domain Expense.
 * Participant order of the request is kept; it decides who gets remainder cents.
 */
export function toExpense(body: CreateExpenseDto, now: Date = new Date()): Expense {
  return {
    id: body.id ?? randomUUID(),
    description: body.description,
    amount: body.amount,
    payer: body.payer,
    participants: toParticipantWeights(body.participants),
    splitMode: body.splitMode,
    date: body.date ?? now.toISOString(),
    groupId: body.groupId,
    notes: body.notes,
  };
}

export function createExpenseRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateExpenseSchema), (c) => {
    const service = c.get("service");
    const record = service.addExpense(toExpense(c.get("validatedBody")));
    return c.json({ data: record }, 201);
  });

  routes.get("/", (c) => {
    const service = c.get("service");
    return c.json({ data: service.listExpenses() });
  });

  return routes;
}
