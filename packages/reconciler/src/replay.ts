/**
 * @tally/reconciler — Deterministic replay verification.
 *
 * Rebuilds the Ledger twice from the same history and compares the
 * content-addressed hashes of the two balance tables. Optionally
 * compares against a hash recorded earlier.
 *
 * Hash algorithm:
 * 1. Canonicalize the balance-table snapshot (RFC 8785 / JCS)
 * 2. SHA-256 the canonical form → hex digest
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { History } from "@tally/types";
import type { BalanceTableSnapshot } from "@tally/ledger";
import { rebuild } from "./rebuild.js";
import type { ReplayDiscrepancy, ReplayResult } from "./types.js";
import { ReconcileError } from "./types.js";

function sha256(data: string): string {
  return createHash("sha256").update(data).digest("hex");
}

/**
 * Compute the canonical hash of a balance-table snapshot.
 */
export function hashBalanceTable(snapshot: BalanceTableSnapshot): string {
  return sha256(canonicalize(snapshot));
}

/**
 * Verify that the history replays to the same balance table every time.
 *
 * @param expectedHash - A previously recorded hash the replay must reproduce
 */
export function verifyReplay(history: History, expectedHash?: string): ReplayResult {
  const discrepancies: ReplayDiscrepancy[] = [];

  const original = rebuild(history);
  const replayed = rebuild(history);

  const hash = hashBalanceTable(original.snapshot());
  const replayedHash = hashBalanceTable(replayed.snapshot());

  if (hash !== replayedHash) {
    discrepancies.push({
      expected: hash,
      actual: replayedHash,
      description: "Balance table hash changed between rebuilds",
    });
  }

  if (expectedHash !== undefined && hash !== expectedHash) {
    discrepancies.push({
      expected: expectedHash,
      actual: hash,
      description: "Balance table hash does not match expected hash",
    });
  }

  return {
    verdict: discrepancies.length === 0 ? "PASS" : "FAIL",
    hash,
    replayedHash,
    eventCount: original.appliedCount,
    discrepancies,
  };
}

/**
 * Like verifyReplay, but throws REPLAY_DIVERGED on failure.
 * Returns the verified hash.
 */
export function assertReplay(history: History, expectedHash?: string): string {
  const result = verifyReplay(history, expectedHash);
  if (result.verdict === "FAIL") {
    throw new ReconcileError(
      "REPLAY_DIVERGED",
      result.discrepancies.map((d) => d.description).join("; "),
    );
  }
  return result.hash;
}
