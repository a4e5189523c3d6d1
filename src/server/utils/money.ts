/**
 * Money helpers. Amounts are kept as integer minor units (centavos).
 */

const DECIMAL_AMOUNT = /^([+-])?(\d+)(?:[.,](\d{1,2}))?$/;

/**
 * Parses a decimal amount such as "1234.5" or "-10,00" into minor units.
 * Returns null for anything that is not a plain decimal number.
 */
export function parseMinorUnits(value: string | number): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.round(value * 100) : null;
  }
  const match = DECIMAL_AMOUNT.exec(value.trim());
  if (!match) return null;

  const [, sign, whole, fraction = ''] = match;
  const minor = Number(whole) * 100 + Number(fraction.padEnd(2, '0'));
  return sign === '-' ? -minor : minor;
}

export function toMajorUnits(minor: number): number {
  return minor / 100;
}

export function formatMinor(minor: number): string {
  return (minor / 100).toFixed(2);
}
