import { formatUnits } from 'ethers';
import { ValidationError } from '../errors';

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?$/;

function assertDecimals(decimals: number): void {
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > 77) {
    throw ValidationError.invalidField('decimals', `${decimals} is not a valid token decimal count`);
  }
}

/**
 * Scales a decimal amount to integer minor units, rounding half up on the
 * first dropped digit. Works on the digits directly so no precision is lost
 * to floating point.
 */
export function toMinorUnits(amount: string, decimals: number): bigint {
  assertDecimals(decimals);

  const match = DECIMAL_PATTERN.exec(amount.trim());
  if (!match) {
    throw ValidationError.invalidField('amount', `"${amount}" is not a non-negative decimal number`);
  }

  const whole = match[1];
  const fraction = match[2] ?? '';
  const kept = fraction.slice(0, decimals).padEnd(decimals, '0');
  const dropped = fraction.slice(decimals);

  let minor = BigInt(whole) * 10n ** BigInt(decimals) + BigInt(kept === '' ? '0' : kept);
  if (dropped.length > 0 && dropped.charCodeAt(0) >= '5'.charCodeAt(0)) {
    minor += 1n;
  }
  return minor;
}

export function fromMinorUnits(minor: bigint, decimals: number): string {
  assertDecimals(decimals);
  return formatUnits(minor, decimals);
}

/**
 * Drops trailing fractional zeros, as PostgreSQL pads NUMERIC columns to
 * their declared scale ("100.500000" becomes "100.5").
 */
export function normalizeDecimal(value: string | number): string {
  const text = String(value).trim();
  if (!text.includes('.')) {
    return text;
  }
  return text.replace(/0+$/, '').replace(/\.$/, '');
}
