/**
 * Half-up rounding to a fixed number of decimals, away from zero for
 * negatives. toPrecision(15) absorbs binary noise such as
 * 1.005 * 100 = 100.49999999999999.
 */
export function roundHalfUp(value: number, decimals = 2): number {
  if (!Number.isFinite(value)) return value;
  const factor = 10 ** decimals;
  const scaled = Number((Math.abs(value) * factor).toPrecision(15));
  const rounded = Math.round(scaled) / factor;
  if (rounded === 0) return 0;
  return value < 0 ? -rounded : rounded;
}

export function toCents(amount: number): number {
  return Math.round(Number((amount * 100).toPrecision(15)));
}

export function fromCents(cents: number): number {
  return cents / 100;
}

/** quantity × unit price in integer cents, so sums stay exact */
export function lineCents(quantity: number, unitPrice: number): number {
  return quantity * toCents(unitPrice);
}
