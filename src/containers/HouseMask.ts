import type { BitSemantics } from './BitSet.ts';

import { BitSet } from './BitSet.ts';

const HOUSE_SIZE = 9;

const CELL_INDEX_SEMANTICS: BitSemantics<number> = {
  capacity: HOUSE_SIZE,
  fromIndex: (index) => index,
  toIndex: (cellIndex) => cellIndex
};

/**
 * Cells of one house, addressed by their 0-8 in-house index.
 */
export class HouseMask extends BitSet<number, HouseMask> {
  public static readonly EMPTY = new HouseMask(BitSet.wordsOf(CELL_INDEX_SEMANTICS, []));

  protected readonly semantics = CELL_INDEX_SEMANTICS;

  public static fromIterable(cellIndices: Iterable<number>): HouseMask {
    return new HouseMask(BitSet.wordsOf(CELL_INDEX_SEMANTICS, cellIndices));
  }

  public static of(...cellIndices: readonly number[]): HouseMask {
    return HouseMask.fromIterable(cellIndices);
  }

  protected create(words: readonly number[]): HouseMask {
    return new HouseMask(words);
  }
}
