import { Decimal } from 'decimal.js';

/**
 * Converts an integer count of cents (as digits) to a two-place amount.
 */
export function centsToAmount(cents: string | number): Decimal {
  return new Decimal(cents).dividedBy(100);
}

export function formatAmount(amount: Decimal): string {
  return amount.toFixed(2);
}

export function parseAmount(value: string): Decimal {
  return new Decimal(value);
}
