/**
 * @tally/ledger — Allocator.
 *
 * Divides a shared amount among participants under a split policy.
 * Policies are a closed set of pure functions looked up by their
 * persisted tag; nothing stateful is reconstructed on replay.
 *
 * Conservation: for EqualSplit and ShareSplit the allocations always
 * sum to the input amount exactly, in minor units.
 */

import type { Identity, ParticipantWeights, SplitModeTag } from "@tally/types";
import { isSplitModeTag } from "@tally/types";
import {
  EPSILON,
  fromMinorUnits,
  roundToMinorUnit,
  sumMinorUnits,
  toMinorUnits,
} from "./money-math.js";
import type { MinorAllocation, ParticipantEntry, SplitPolicy } from "./types.js";
import {
  AllocationFaultError,
  UnknownSplitModeError,
  ValidationError,
} from "./types.js";

/** Upper bound on single-unit redistribution steps per allocation. */
export const MAX_REDISTRIBUTION_STEPS = 1000;

/** Allowed gap between the sum of exact amounts and the total. */
export const EXACT_SPLIT_TOLERANCE = 0.01;

// ─── Remainder redistribution ────────────────────────────────────────────

/**
 * Hand out `amount − Σshares` one minor unit at a time, cycling through
 * participants in order from the first. Units are added when the
 * remainder is positive and taken away when it is negative.
 */
function redistributeRemainder(amount: bigint, shares: readonly bigint[]): bigint[] {
  const remainder = amount - sumMinorUnits(shares);
  if (remainder === 0n) {
    return [...shares];
  }

  const steps = remainder < 0n ? -remainder : remainder;
  if (steps > BigInt(MAX_REDISTRIBUTION_STEPS)) {
    throw new AllocationFaultError(
      `Remainder of ${steps.toString()} minor units exceeds the redistribution cap of ${String(MAX_REDISTRIBUTION_STEPS)}`,
    );
  }

  const unit = remainder > 0n ? 1n : -1n;
  const count = BigInt(shares.length);
  const fullRounds = steps / count;
  const extra = steps % count;

  return shares.map((share, index) => {
    const bumps = fullRounds + (BigInt(index) < extra ? 1n : 0n);
    return share + unit * bumps;
  });
}

function zipAllocation(
  participants: readonly (readonly [Identity, number])[],
  shares: readonly bigint[],
): Map<Identity, bigint> {
  const allocation = new Map<Identity, bigint>();
  participants.forEach(([identity], index) => {
    allocation.set(identity, shares[index] ?? 0n);
  });
  return allocation;
}

// ─── Policies ────────────────────────────────────────────────────────────

const equalSplit: SplitPolicy = (amount, participants) => {
  const base = roundToMinorUnit(Number(amount) / participants.length);
  const shares = redistributeRemainder(
    amount,
    participants.map(() => base),
  );
  return zipAllocation(participants, shares);
};

const exactSplit: SplitPolicy = (amount, participants) => {
  for (const [identity, weight] of participants) {
    if (weight < 0) {
      throw new ValidationError(
        "INVALID_AMOUNT",
        `Exact amount for "${identity}" must not be negative, got ${String(weight)}`,
      );
    }
  }

  const total = participants.reduce((sum, [, weight]) => sum + weight, 0);
  const expected = fromMinorUnits(amount);
  if (Math.abs(total - expected) > EXACT_SPLIT_TOLERANCE + EPSILON) {
    throw new ValidationError(
      "SPLIT_SUM_MISMATCH",
      `Exact split totals ${total.toFixed(2)}, not ${expected.toFixed(2)}`,
    );
  }

  const allocation = new Map<Identity, bigint>();
  for (const [identity, weight] of participants) {
    allocation.set(identity, toMinorUnits(weight));
  }
  return allocation;
};

const shareSplit: SplitPolicy = (amount, participants) => {
  for (const [identity, weight] of participants) {
    if (weight <= 0) {
      throw new ValidationError(
        "NON_POSITIVE_SHARE",
        `All shares must be positive; "${identity}" has ${String(weight)}`,
      );
    }
  }

  const totalWeight = participants.reduce((sum, [, weight]) => sum + weight, 0);
  const rounded = participants.map(([, weight]) =>
    roundToMinorUnit((Number(amount) * weight) / totalWeight),
  );
  return zipAllocation(participants, redistributeRemainder(amount, rounded));
};

/**
 * Split policies keyed by their persisted tag.
 */
export const SPLIT_MODES: Readonly<Record<SplitModeTag, SplitPolicy>> = {
  EqualSplit: equalSplit,
  ExactSplit: exactSplit,
  ShareSplit: shareSplit,
};

/**
 * Resolve a persisted tag to a known split mode.
 * Throws UnknownSplitModeError for anything else.
 */
export function resolveSplitMode(tag: string): SplitModeTag {
  if (!isSplitModeTag(tag)) {
    throw new UnknownSplitModeError(tag);
  }
  return tag;
}

// ─── Identities ──────────────────────────────────────────────────────────

/**
 * Strings JS objects treat as array indices. Such keys are enumerated
 * ahead of all others, which would reorder participants.
 */
const INTEGER_KEY = /^(0|[1-9]\d*)$/;

export function isOrderSafeIdentity(identity: Identity): boolean {
  return identity.length > 0 && !INTEGER_KEY.test(identity);
}

/**
 * Throws INVALID_IDENTITY for an empty or bare-integer identity.
 */
export function assertIdentity(identity: Identity): void {
  if (!isOrderSafeIdentity(identity)) {
    throw new ValidationError(
      "INVALID_IDENTITY",
      `Identity must be non-empty and not a bare integer, got "${identity}"`,
    );
  }
}

// ─── Public API ──────────────────────────────────────────────────────────

/**
 * Allocate `amount` minor units among participants.
 *
 * Validation (fail-closed, nothing is allocated on failure):
 * 1. amount must be positive
 * 2. at least one participant
 * 3. every weight must be a finite number
 * 4. mode-specific checks (exact sum, positive shares)
 */
export function allocateMinorUnits(
  amount: bigint,
  participants: ParticipantWeights,
  mode: SplitModeTag,
): MinorAllocation {
  if (amount <= 0n) {
    throw new ValidationError(
      "NON_POSITIVE_AMOUNT",
      `Amount must be positive, got ${fromMinorUnits(amount).toFixed(2)}`,
    );
  }

  const entries = Object.entries(participants);
  if (entries.length === 0) {
    throw new ValidationError("EMPTY_PARTICIPANTS", "At least one participant is required");
  }

  for (const [identity, weight] of entries) {
    if (!Number.isFinite(weight)) {
      throw new ValidationError(
        "INVALID_AMOUNT",
        `Weight for "${identity}" must be a finite number, got ${String(weight)}`,
      );
    }
  }

  return SPLIT_MODES[mode](amount, entries);
}

/**
 * Allocate a decimal amount among participants.
 *
 * allocate(10, { A: 1, B: 1, C: 1 }, "EqualSplit") → { A: 3.34, B: 3.33, C: 3.33 }
 */
export function allocate(
  amount: number,
  participants: ParticipantWeights,
  mode: SplitModeTag,
): Record<Identity, number> {
  const allocation = allocateMinorUnits(toMinorUnits(amount), participants, mode);
  return Object.fromEntries(
    [...allocation].map(([identity, owed]) => [identity, fromMinorUnits(owed)]),
  );
}

/**
 * Build participant weights from an explicitly ordered list. The
 * result enumerates in list order, so remainder units follow it.
 * Throws DUPLICATE_IDENTITY if an identity repeats and
 * INVALID_IDENTITY for a bare-integer identity.
 */
export function toParticipantWeights(
  entries: readonly ParticipantEntry[],
): ParticipantWeights {
  const seen = new Set<Identity>();
  for (const { identity } of entries) {
    assertIdentity(identity);
    if (seen.has(identity)) {
      throw new ValidationError(
        "DUPLICATE_IDENTITY",
        `Participant listed more than once: "${identity}"`,
      );
    }
    seen.add(identity);
  }
  return Object.fromEntries(entries.map(({ identity, weight }) => [identity, weight]));
}
