/**
 * Fixed-point money helpers. Amounts are integer cents everywhere inside the
 * domain so that totals are exact sums.
 */

import {Either, Left, Right} from 'purify-ts';
import {Cents} from '../domain';
import {CrmError, formatError, rangeError} from './errors';

const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d*))?$/;

// Digits kept when expanding a float; enough to expose any sub-cent remainder.
const FLOAT_DIGITS = 20;

function toDecimalText(value: number | string): string {
  if (typeof value === 'string') {
    return value.trim();
  }
  // toFixed switches to exponent notation from 1e21 upwards
  return Number.isFinite(value) && Math.abs(value) < 1e21 ? value.toFixed(FLOAT_DIGITS) : String(value);
}

/**
 * Round the digits after the cent position half-to-even: strictly above half
 * rounds up, exactly half rounds to the even cent.
 */
function roundsUp(cents: number, remainder: string): boolean {
  const first = remainder.charAt(0);
  if (first === '' || first < '5') {
    return false;
  }
  if (first > '5' || /[1-9]/.test(remainder.slice(1))) {
    return true;
  }
  return cents % 2 === 1;
}

/**
 * Parse a price into cents, rounded half-to-even to two places. Only text
 * that is not a plain decimal fails, with FormatError; amounts past the safe
 * integer range fail with RangeError.
 */
export function parseMoney(value: number | string): Either<CrmError, Cents> {
  const text = toDecimalText(value);
  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    if (typeof value === 'number' && Number.isFinite(value)) {
      return Left(rangeError('Price is too large.'));
    }
    return Left(formatError(`Invalid price: ${text}`));
  }

  const [, sign, whole, fraction = ''] = match;
  const truncated = Number(whole) * 100 + Number(fraction.slice(0, 2).padEnd(2, '0'));
  const cents = roundsUp(truncated, fraction.slice(2)) ? truncated + 1 : truncated;
  if (!Number.isSafeInteger(cents)) {
    return Left(rangeError('Price is too large.'));
  }
  return Right(sign && cents !== 0 ? -cents : cents);
}

export function formatCents(amount: Cents): string {
  const abs = Math.abs(amount);
  const whole = Math.floor(abs / 100);
  const fraction = String(abs % 100).padStart(2, '0');
  return `${amount < 0 ? '-' : ''}${whole}.${fraction}`;
}

export function sumCents(amounts: Cents[]): Cents {
  return amounts.reduce((sum, amount) => sum + amount, 0);
}
