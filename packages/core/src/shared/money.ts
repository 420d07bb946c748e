/**
 * Amounts are carried as numbers with at most two decimals and summed in
 * integer cents, so a request total always equals the sum of its lines.
 */
/** Largest quantity a line may carry; item quantities are INTEGER columns. */
export const MAX_QUANTITY = 1_000_000;
/** Largest unit price, the NUMERIC(12, 2) column limit. */
export const MAX_UNIT_PRICE = 9_999_999_999.99;
/** Largest line or request total in cents, the NUMERIC(14, 2) column limit. */
export const MAX_TOTAL_CENTS = 99_999_999_999_999;

export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

const TWO_DECIMALS = /^-?\d+(\.\d{1,2})?$/;

/** Checked on the shortest decimal form of the number, as JSON carries it. */
export function hasAtMostTwoDecimals(amount: number): boolean {
  return TWO_DECIMALS.test(String(amount));
}

export function totalCents(lines: ReadonlyArray<{ quantity: number; unit_price: number }>): number {
  return lines.reduce((acc, line) => acc + line.quantity * toCents(line.unit_price), 0);
}

export function lineTotal(quantity: number, unitPrice: number): number {
  return fromCents(quantity * toCents(unitPrice));
}

export function sumLines(lines: ReadonlyArray<{ quantity: number; unit_price: number }>): number {
  return fromCents(totalCents(lines));
}
