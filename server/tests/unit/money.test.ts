import { describe, expect, it } from "vitest";

import { formatCurrency, fromCents, isValidCents, toCents } from "../../src/domain/money.js";

describe("money", () => {
  it("converts decimals to integer cents", () => {
    expect(toCents(150)).toBe(15_000);
    expect(toCents(35000.0)).toBe(3_500_000);
    expect(toCents(19.99)).toBe(1_999);
    expect(toCents("$1,234.56")).toBe(123_456);
  });

  it("rejects garbage", () => {
    expect(() => toCents("abc")).toThrow("Invalid money input: abc");
  });

  it("converts back and formats", () => {
    expect(fromCents(1_999)).toBe(19.99);
    expect(formatCurrency(123_456)).toBe("$1,234.56");
  });

  it("accepts only non-negative safe integers as cents", () => {
    expect(isValidCents(0)).toBe(true);
    expect(isValidCents(15_000)).toBe(true);
    expect(isValidCents(-1)).toBe(false);
    expect(isValidCents(1.5)).toBe(false);
    expect(isValidCents(Number.NaN)).toBe(false);
    expect(isValidCents("100")).toBe(false);
  });
});
