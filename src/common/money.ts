import { ValidationError } from './errors/domain-errors';

const AMOUNT_PATTERN = /^(\d+)(?:\.(\d{1,2}))?$/;

/**
 * Parses a non-negative decimal amount ("10", "10.5", "10.50") into integer
 * minor units. More than two fraction digits is rejected rather than rounded.
 */
export function toMinorUnits(amount: string): number {
  const match = AMOUNT_PATTERN.exec(amount.trim());
  if (!match) {
    throw new ValidationError(`Invalid monetary amount: ${amount}`, { amount });
  }
  const [, whole, fraction = ''] = match;
  const minor = parseInt(whole, 10) * 100 + parseInt(fraction.padEnd(2, '0'), 10);
  if (!Number.isSafeInteger(minor)) {
    throw new ValidationError(`Monetary amount out of range: ${amount}`, {
      amount,
    });
  }
  return minor;
}

export function fromMinorUnits(minor: number): string {
  const whole = Math.floor(minor / 100);
  const fraction = minor % 100;
  return `${whole}.${fraction.toString().padStart(2, '0')}`;
}
