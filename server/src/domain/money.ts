/**
 * Money helpers: store money as integer cents.
 * Never store floats in Mongo. Convert at the edges.
 */

export type MoneyCents = number;

/** Parse "$1,234.56" | "1234.56" | 1234.56 into integer cents. */
export function toCents(input: string | number): MoneyCents {
  if (typeof input === "number" && Number.isFinite(input)) {
    return Math.round(input * 100);
  }
  if (typeof input === "string") {
    const s = input.trim();
    // strip currency symbols and commas
    const normalized = s.replace(/[^0-9.-]/g, "");
    const n = Number(normalized);
    if (!normalized || !Number.isFinite(n)) throw new Error(`Invalid money input: ${input}`);
    return Math.round(n * 100);
  }
  throw new Error(`Invalid money input: ${String(input)}`);
}

/** Convert integer cents to decimal dollars (number). */
export function fromCents(cents: MoneyCents): number {
  return Math.round(cents) / 100;
}

/** Format integer cents for display. */
export function formatCurrency(cents: MoneyCents, currency = "USD", locale = "en-US"): string {
  return new Intl.NumberFormat(locale, {
    style: "currency",
    currency,
    currencyDisplay: "symbol",
    maximumFractionDigits: 2,
    minimumFractionDigits: 2,
  }).format(fromCents(cents));
}

export function isValidCents(cents: unknown): cents is MoneyCents {
  return typeof cents === "number" && Number.isSafeInteger(cents) && cents >= 0;
}
