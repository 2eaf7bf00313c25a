/**
 * Money helpers. Store prices are decimals with two fraction digits;
 * arithmetic is done in integer cents.
 */

export type Cents = number;

export function toCents(amount: number): Cents {
  return Math.round(amount * 100);
}

export function fromCents(cents: Cents): number {
  return cents / 100;
}

export function parseMoney(value: string | number | null | undefined): number {
  if (value === null || value === undefined || value === '') return 0;
  const parsed = typeof value === 'number' ? value : Number.parseFloat(value);
  return Number.isFinite(parsed) ? fromCents(toCents(parsed)) : 0;
}

/** Format for Shopify's string price fields */
export function formatMoney(amount: number): string {
  return fromCents(toCents(amount)).toFixed(2);
}
