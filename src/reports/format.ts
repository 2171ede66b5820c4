import Decimal from 'decimal.js';

const amountFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Thousands separators, two decimals: 1234.5 -> '1,234.50'
 */
export function formatAmount(value: number | Decimal): string {
  return amountFormat.format(value instanceof Decimal ? value.toNumber() : value);
}

/**
 * '+' for zero and positive values; negatives carry their own '-'
 */
export function signPrefix(value: number | Decimal): string {
  const nonNegative = value instanceof Decimal ? value.greaterThanOrEqualTo(0) : value >= 0;
  return nonNegative ? '+' : '';
}

/**
 * 'Label' -> 'Label.........................' (dot-filled to width)
 */
export function dotLeader(label: string, width: number): string {
  return label.padEnd(width, '.');
}

export function rule(char: '=' | '-', width: number): string {
  return char.repeat(width);
}

export function displayValue(value: unknown): string {
  if (value === null || value === undefined) {
    return 'N/A';
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}
