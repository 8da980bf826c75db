import type { Digit } from '../Digit.ts';
import type { BitSemantics } from './BitSet.ts';

import { digitFromIndex } from '../Digit.ts';
import { BitSet } from './BitSet.ts';

const DIGIT_COUNT = 9;

const DIGIT_SEMANTICS: BitSemantics<Digit> = {
  capacity: DIGIT_COUNT,
  fromIndex: digitFromIndex,
  toIndex: (digit) => digit - 1
};

/**
 * Candidates of one cell: bit `i` is set when digit `i + 1` is still possible.
 */
export class DigitSet extends BitSet<Digit, DigitSet> {
  public static readonly EMPTY = new DigitSet(BitSet.wordsOf(DIGIT_SEMANTICS, []));
  public static readonly FULL = new DigitSet(BitSet.fullWords(DIGIT_SEMANTICS.capacity));

  protected readonly semantics = DIGIT_SEMANTICS;

  public static fromIterable(digits: Iterable<Digit>): DigitSet {
    return new DigitSet(BitSet.wordsOf(DIGIT_SEMANTICS, digits));
  }

  public static of(...digits: readonly Digit[]): DigitSet {
    return DigitSet.fromIterable(digits);
  }

  protected create(words: readonly number[]): DigitSet {
    return new DigitSet(words);
  }
}
