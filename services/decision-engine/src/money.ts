/**
 * Currency arithmetic.
 *
 * Totals are summed in integer cents so a plan's total is exactly the sum of
 * its line prices, independent of float accumulation order.
 */

export function toCents(value: number): number {
  return Math.round(value * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

export function sumPrices(prices: Iterable<number>): number {
  let cents = 0;
  for (const price of prices) cents += toCents(price);
  return fromCents(cents);
}

/** Positive difference `a - b`, floored at zero, in currency units. */
export function surplus(a: number, b: number): number {
  return fromCents(Math.max(0, toCents(a) - toCents(b)));
}
