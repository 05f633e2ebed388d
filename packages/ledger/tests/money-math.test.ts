/**
 * Tests for the fixed-point money math.
 *
 * Covers:
 * - parseAmount / formatAmount
 * - Range checks at the i64 boundary
 * - Checked arithmetic (add, subtract, abs, negate)
 * - Validation and error cases
 */

import { describe, it, expect } from "vitest";
import {
  AMOUNT_MAX,
  AMOUNT_MIN,
  UNITS_PER_WHOLE,
  isInRange,
  assertInRange,
  parseAmount,
  formatAmount,
  checkedAdd,
  checkedSub,
  absAmount,
  negateAmount,
} from "../src/money-math.js";
import { LedgerError } from "../src/types.js";

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof LedgerError) return err.code;
    throw err;
  }
  return undefined;
}

// ─── parseAmount ─────────────────────────────────────────────────────────

describe("parseAmount", () => {
  it("parses a whole number", () => {
    expect(parseAmount("10")).toBe(100_000n);
  });

  it("parses a decimal number", () => {
    expect(parseAmount("1.5")).toBe(15_000n);
  });

  it("parses four fractional digits exactly", () => {
    expect(parseAmount("0.1234")).toBe(1_234n);
  });

  it("parses zero", () => {
    expect(parseAmount("0")).toBe(0n);
    expect(parseAmount("0.0000")).toBe(0n);
  });

  it("parses a negative number", () => {
    expect(parseAmount("-0.0001")).toBe(-1n);
  });

  it("trims surrounding whitespace", () => {
    expect(parseAmount("  2.25 ")).toBe(22_500n);
  });

  it("rejects empty and whitespace-only strings", () => {
    expect(codeOf(() => parseAmount(""))).toBe("INVALID_AMOUNT");
    expect(codeOf(() => parseAmount("   "))).toBe("INVALID_AMOUNT");
  });

  it("rejects non-numeric input", () => {
    expect(codeOf(() => parseAmount("abc"))).toBe("INVALID_AMOUNT");
    expect(codeOf(() => parseAmount("1e5"))).toBe("INVALID_AMOUNT");
    expect(codeOf(() => parseAmount("1."))).toBe("INVALID_AMOUNT");
    expect(codeOf(() => parseAmount(".5"))).toBe("INVALID_AMOUNT");
  });

  it("rejects more than four fractional digits", () => {
    expect(codeOf(() => parseAmount("1.23456"))).toBe("INVALID_AMOUNT");
  });

  it("accepts the largest representable amount", () => {
    expect(parseAmount("922337203685477.5807")).toBe(AMOUNT_MAX);
  });

  it("accepts the smallest representable amount", () => {
    expect(parseAmount("-922337203685477.5808")).toBe(AMOUNT_MIN);
  });

  it("rejects amounts past the i64 range", () => {
    expect(codeOf(() => parseAmount("922337203685477.5808"))).toBe("AMOUNT_OVERFLOW");
    expect(codeOf(() => parseAmount("-922337203685477.5809"))).toBe("AMOUNT_OVERFLOW");
  });
});

// ─── formatAmount ────────────────────────────────────────────────────────

describe("formatAmount", () => {
  it("always renders four fractional digits", () => {
    expect(formatAmount(100_000n)).toBe("10.0000");
    expect(formatAmount(15_000n)).toBe("1.5000");
  });

  it("pads small values with leading zeros", () => {
    expect(formatAmount(1n)).toBe("0.0001");
    expect(formatAmount(0n)).toBe("0.0000");
  });

  it("renders negatives with a leading minus", () => {
    expect(formatAmount(-1n)).toBe("-0.0001");
    expect(formatAmount(-123_456n)).toBe("-12.3456");
  });

  it("renders the range limits", () => {
    expect(formatAmount(AMOUNT_MAX)).toBe("922337203685477.5807");
    expect(formatAmount(AMOUNT_MIN)).toBe("-922337203685477.5808");
  });

  it("round-trips through parseAmount", () => {
    expect(parseAmount(formatAmount(87_660n))).toBe(87_660n);
  });
});

// ─── Range checks ────────────────────────────────────────────────────────

describe("range checks", () => {
  it("UNITS_PER_WHOLE is 10^4", () => {
    expect(UNITS_PER_WHOLE).toBe(10_000n);
  });

  it("isInRange holds at the limits and fails just past them", () => {
    expect(isInRange(AMOUNT_MAX)).toBe(true);
    expect(isInRange(AMOUNT_MIN)).toBe(true);
    expect(isInRange(AMOUNT_MAX + 1n)).toBe(false);
    expect(isInRange(AMOUNT_MIN - 1n)).toBe(false);
  });

  it("assertInRange returns the value unchanged", () => {
    expect(assertInRange(42n)).toBe(42n);
  });

  it("assertInRange names the context in its message", () => {
    expect(() => assertInRange(AMOUNT_MAX + 1n, "Balance")).toThrow(
      "Balance overflows the fixed-point range",
    );
  });
});

// ─── Checked arithmetic ──────────────────────────────────────────────────

describe("checked arithmetic", () => {
  it("adds and subtracts exactly", () => {
    expect(checkedAdd(10_000n, 1_234n)).toBe(11_234n);
    expect(checkedSub(10_000n, 1_234n)).toBe(8_766n);
  });

  it("allows results that land exactly on the limits", () => {
    expect(checkedAdd(AMOUNT_MAX - 1n, 1n)).toBe(AMOUNT_MAX);
    expect(checkedSub(AMOUNT_MIN + 1n, 1n)).toBe(AMOUNT_MIN);
  });

  it("throws AMOUNT_OVERFLOW instead of wrapping", () => {
    expect(codeOf(() => checkedAdd(AMOUNT_MAX, 1n))).toBe("AMOUNT_OVERFLOW");
    expect(codeOf(() => checkedSub(AMOUNT_MIN, 1n))).toBe("AMOUNT_OVERFLOW");
    expect(codeOf(() => checkedSub(0n, AMOUNT_MIN))).toBe("AMOUNT_OVERFLOW");
  });

  it("absAmount flips negatives only", () => {
    expect(absAmount(-5n)).toBe(5n);
    expect(absAmount(5n)).toBe(5n);
    expect(absAmount(0n)).toBe(0n);
  });

  it("absAmount of AMOUNT_MIN overflows", () => {
    expect(codeOf(() => absAmount(AMOUNT_MIN))).toBe("AMOUNT_OVERFLOW");
  });

  it("negateAmount flips the sign", () => {
    expect(negateAmount(150_000n)).toBe(-150_000n);
    expect(negateAmount(AMOUNT_MAX)).toBe(AMOUNT_MIN + 1n);
  });
});
