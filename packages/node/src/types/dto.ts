/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Schemas check structure and the date and identity formats; amounts
 * and split rules are validated by the domain so that they surface
 * with domain error codes.
 */

import { z } from "zod";
import { isOrderSafeIdentity } from "@tally/ledger";

// =============================================================================
// Shared Schemas
// =============================================================================

export const IdentitySchema = z
  .string()
  .min(1)
  .max(256)
  .refine(isOrderSafeIdentity, "Identity must not be a bare integer");

/** ISO-8601 with an explicit offset, so the instant never depends on the server's zone. */
export const DateTimeSchema = z.string().datetime({ offset: true });

export const RecordIdSchema = z.string().min(1).max(128);

export const SplitModeSchema = z.enum(["EqualSplit", "ExactSplit", "ShareSplit"]);

export const ParticipantSchema = z.object({
  identity: IdentitySchema,
  /** Ignored for EqualSplit, the owed amount for ExactSplit, the share for ShareSplit */
  weight: z.number().finite().default(1),
});

// =============================================================================
// Expense DTOs
// =============================================================================

export const CreateExpenseSchema = z.object({
  id: RecordIdSchema.optional(),
  description: z.string().max(1024).default(""),
  amount: z.number().finite(),
  payer: IdentitySchema,
  /** Ordered: remainder units go to the first participants in this list */
  participants: z.array(ParticipantSchema),
  splitMode: SplitModeSchema,
  date: DateTimeSchema.optional(),
  groupId: RecordIdSchema.optional(),
  notes: z.string().max(4096).default(""),
});

export type CreateExpenseDto = z.infer<typeof CreateExpenseSchema>;

// =============================================================================
// Settlement DTOs
// =============================================================================

export const CreateSettlementSchema = z.object({
  id: RecordIdSchema.optional(),
  payer: IdentitySchema,
  payee: IdentitySchema,
  amount: z.number().finite(),
  description: z.string().max(1024).default(""),
  date: DateTimeSchema.optional(),
  notes: z.string().max(4096).default(""),
});

export type CreateSettlementDto = z.infer<typeof CreateSettlementSchema>;

// =============================================================================
// Group DTOs
// =============================================================================

export const CreateGroupSchema = z.object({
  id: RecordIdSchema.optional(),
  name: z.string().trim().min(1).max(256),
});

export type CreateGroupDto = z.infer<typeof CreateGroupSchema>;

// =============================================================================
// Query DTOs
// =============================================================================

export const ActivityQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

export type ActivityQuery = z.infer<typeof ActivityQuerySchema>;

export const BalancesQuerySchema = z.object({
  asOf: z.string().min(1).optional(),
});

export type BalancesQuery = z.infer<typeof BalancesQuerySchema>;

export const VerifyQuerySchema = z.object({
  expectedHash: z.string().min(1).optional(),
});

export type VerifyQuery = z.infer<typeof VerifyQuerySchema>;
