import { ensureNonNullable } from './typeGuards.ts';

export type Digit = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

/* eslint-disable-next-line no-magic-numbers -- The digits themselves. */
export const DIGITS: readonly Digit[] = [1, 2, 3, 4, 5, 6, 7, 8, 9];

export function digitFromIndex(index: number): Digit {
  return ensureNonNullable(DIGITS[index], `Digit index out of range: ${String(index)}`);
}

export function isDigit(value: number): value is Digit {
  return DIGITS.some((digit) => digit === value);
}
