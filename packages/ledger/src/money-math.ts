/**
 * @tally/ledger — Fixed-point monetary arithmetic.
 *
 * Every amount is a bigint count of 1/10000 units (scale 4), bounded to
 * the signed 64-bit range. String amounts are converted to/from bigint
 * via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Every result is range-checked; leaving the range throws AMOUNT_OVERFLOW
 * - Amounts must be valid decimal strings with at most 4 fractional digits
 * - Zero runtime dependencies
 */

import type { Amount } from "@tally/types";
import { LedgerError } from "./types.js";

// ─── Constants ───────────────────────────────────────────────────────────

/** Number of fractional digits carried by every amount. */
export const AMOUNT_SCALE = 4;

/** Scaled units per whole unit (10^AMOUNT_SCALE). */
export const UNITS_PER_WHOLE = 10n ** BigInt(AMOUNT_SCALE);

/** Largest representable amount, in scaled units (i64 max). */
export const AMOUNT_MAX: Amount = 2n ** 63n - 1n;

/** Smallest representable amount, in scaled units (i64 min). */
export const AMOUNT_MIN: Amount = -(2n ** 63n);

// ─── Range Checks ────────────────────────────────────────────────────────

export function isInRange(value: Amount): boolean {
  return value >= AMOUNT_MIN && value <= AMOUNT_MAX;
}

/**
 * Throw AMOUNT_OVERFLOW if value is outside the fixed-point range.
 * Returns the value unchanged otherwise.
 */
export function assertInRange(value: Amount, context = "amount"): Amount {
  if (!isInRange(value)) {
    throw new LedgerError(
      "AMOUNT_OVERFLOW",
      `${context} overflows the fixed-point range: ${value.toString()} units`,
    );
  }
  return value;
}

// ─── Parse / Format ──────────────────────────────────────────────────────

/**
 * Parse a decimal string into scaled units.
 *
 * "10" → 100000n
 * "1.5" → 15000n
 * "-0.0001" → -1n
 */
export function parseAmount(text: string): Amount {
  const trimmed = text.trim();
  if (trimmed === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${text}"`);
  }

  // Optional minus, digits, optional decimal point + digits
  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > AMOUNT_SCALE) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, at most ${String(AMOUNT_SCALE)} are allowed`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(AMOUNT_SCALE, "0"));
  return assertInRange(negative ? -value : value, `Amount "${trimmed}"`);
}

/**
 * Render scaled units with exactly four fractional digits.
 *
 * 100000n → "10.0000"
 * -1n → "-0.0001"
 */
export function formatAmount(value: Amount): string {
  const negative = value < 0n;
  const abs = negative ? -value : value;
  const str = abs.toString().padStart(AMOUNT_SCALE + 1, "0");
  const intPart = str.slice(0, str.length - AMOUNT_SCALE);
  const fracPart = str.slice(str.length - AMOUNT_SCALE);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

// ─── Checked Arithmetic ──────────────────────────────────────────────────

/**
 * a + b, throwing AMOUNT_OVERFLOW instead of leaving the range.
 */
export function checkedAdd(a: Amount, b: Amount): Amount {
  return assertInRange(a + b, "Sum");
}

/**
 * a - b, throwing AMOUNT_OVERFLOW instead of leaving the range.
 */
export function checkedSub(a: Amount, b: Amount): Amount {
  return assertInRange(a - b, "Difference");
}

/**
 * |a|. AMOUNT_MIN has no positive counterpart and overflows.
 */
export function absAmount(a: Amount): Amount {
  return assertInRange(a < 0n ? -a : a, "Absolute value");
}

/**
 * -a. Withdrawals are cached with the sign flipped.
 */
export function negateAmount(a: Amount): Amount {
  return assertInRange(-a, "Negation");
}
