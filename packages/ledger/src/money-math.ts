/**
 * @tally/ledger — Deterministic monetary arithmetic.
 *
 * All engine arithmetic uses bigint minor units (cents).
 * Decimal numbers enter and leave through toMinorUnits / fromMinorUnits.
 *
 * Rules:
 * - Currency precision is fixed at 2 decimal digits
 * - Rounding is half away from zero
 * - Zero runtime dependencies
 */

import { ValidationError } from "./types.js";

/** Fixed currency precision. */
export const CURRENCY_DECIMALS = 2;

/** Values closer to zero than this are treated as zero. */
export const EPSILON = 1e-6;

// ─── String ↔ bigint ─────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number = CURRENCY_DECIMALS): bigint {
  const trimmed = amount.trim();

  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new ValidationError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > decimals) {
    throw new ValidationError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but currency allows ${String(decimals)}`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * -5n with decimals=2 → "-0.05"
 */
export function formatAmount(scaled: bigint, decimals: number = CURRENCY_DECIMALS): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const result = `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;

  return negative ? `-${result}` : result;
}

// ─── number ↔ bigint ─────────────────────────────────────────────────────

/**
 * Round a decimal number to currency precision and scale to minor units.
 *
 * 30 → 3000n, 3.336 → 334n, -0.001 → 0n
 */
export function toMinorUnits(value: number): bigint {
  if (!Number.isFinite(value)) {
    throw new ValidationError("INVALID_AMOUNT", `Amount must be a finite number, got: ${String(value)}`);
  }
  // toFixed switches to exponent notation at 1e21, which parseAmount rejects
  return parseAmount(value.toFixed(CURRENCY_DECIMALS));
}

/**
 * Convert minor units back to a decimal number (3334n → 33.34).
 */
export function fromMinorUnits(scaled: bigint): number {
  return Number(formatAmount(scaled));
}

/**
 * Round a decimal number to currency precision. Never yields -0.
 */
export function roundCurrency(value: number): number {
  return fromMinorUnits(toMinorUnits(value));
}

/**
 * Round a non-integral count of minor units to the nearest unit,
 * half away from zero.
 */
export function roundToMinorUnit(value: number): bigint {
  const rounded = Math.round(Math.abs(value));
  return BigInt(value < 0 ? -rounded : rounded);
}

/**
 * Sum a list of minor-unit amounts.
 */
export function sumMinorUnits(values: Iterable<bigint>): bigint {
  let total = 0n;
  for (const v of values) {
    total += v;
  }
  return total;
}
