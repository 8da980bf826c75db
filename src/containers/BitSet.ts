/**
 * Maps a domain value (digit, position, in-house index) to a bit index and back.
 */
export interface BitSemantics<T> {
  readonly capacity: number;
  fromIndex(index: number): T;
  toIndex(value: T): number;
}

const FULL_WORD = 0xffffffff;
const PAIR_SIZE = 2;
const HIGHEST_BIT_INDEX = 31;
const WORD_BITS = 32;
const WORD_INDEX_SHIFT = 5;
const WORD_OFFSET_MASK = 31;

const POPCOUNT_M1 = 0x55555555;
const POPCOUNT_M2 = 0x33333333;
const POPCOUNT_M4 = 0x0f0f0f0f;
const POPCOUNT_H01 = 0x01010101;
const POPCOUNT_SHIFT_2 = 2;
const POPCOUNT_SHIFT_4 = 4;
const POPCOUNT_SHIFT_24 = 24;

/**
 * Fixed-width immutable bit set. Every operation returns a new set; iteration
 * visits elements in ascending bit order.
 *
 * Subclasses bind the element type through their semantics and rebuild
 * themselves through {@link BitSet.create}, so set algebra keeps the concrete
 * type (a `DigitSet` union a `DigitSet` is a `DigitSet`).
 */
export abstract class BitSet<T, TSet extends BitSet<T, TSet>> implements Iterable<T> {
  public get size(): number {
    let count = 0;
    for (const word of this.words) {
      count += popCount(word);
    }
    return count;
  }

  protected abstract readonly semantics: BitSemantics<T>;

  protected constructor(protected readonly words: readonly number[]) {
  }

  protected static fullWords(capacity: number): number[] {
    return Array.from({ length: wordCount(capacity) }, (_, i) => wordMask(capacity, i));
  }

  protected static wordsOf<T>(semantics: BitSemantics<T>, values: Iterable<T>): number[] {
    const words = Array.from({ length: wordCount(semantics.capacity) }, () => 0);
    for (const value of values) {
      const index = checkedIndex(semantics, value);
      const wordIndex = index >>> WORD_INDEX_SHIFT;
      words[wordIndex] = ((words[wordIndex] ?? 0) | (1 << (index & WORD_OFFSET_MASK))) >>> 0;
    }
    return words;
  }

  public *[Symbol.iterator](): Iterator<T> {
    for (let wordIndex = 0; wordIndex < this.words.length; wordIndex++) {
      let word = this.words[wordIndex] ?? 0;
      while (word !== 0) {
        const bit = lowestBitIndex(word);
        yield this.semantics.fromIndex(wordIndex * WORD_BITS + bit);
        word = (word & (word - 1)) >>> 0;
      }
    }
  }

  /**
   * Returns the set in the form `[a,b]` when it holds exactly two elements.
   */
  public asPair(): null | [T, T] {
    if (this.size !== PAIR_SIZE) {
      return null;
    }
    const [first, second] = this.toArray();
    if (first === undefined || second === undefined) {
      return null;
    }
    return [first, second];
  }

  public asSingle(): null | T {
    return this.size === 1 ? this.first() : null;
  }

  public complement(): TSet {
    return this.create(this.words.map((word, i) => (~word & wordMask(this.semantics.capacity, i)) >>> 0));
  }

  public difference(other: TSet): TSet {
    return this.create(this.words.map((word, i) => (word & ~(other.words[i] ?? 0)) >>> 0));
  }

  public equals(other: TSet): boolean {
    return this.words.every((word, i) => word === other.words[i]);
  }

  public first(): null | T {
    for (let wordIndex = 0; wordIndex < this.words.length; wordIndex++) {
      const word = this.words[wordIndex] ?? 0;
      if (word !== 0) {
        return this.semantics.fromIndex(wordIndex * WORD_BITS + lowestBitIndex(word));
      }
    }
    return null;
  }

  public has(value: T): boolean {
    const index = checkedIndex(this.semantics, value);
    const word = this.words[index >>> WORD_INDEX_SHIFT] ?? 0;
    return ((word >>> (index & WORD_OFFSET_MASK)) & 1) === 1;
  }

  public intersection(other: TSet): TSet {
    return this.create(this.words.map((word, i) => (word & (other.words[i] ?? 0)) >>> 0));
  }

  public isEmpty(): boolean {
    return this.words.every((word) => word === 0);
  }

  public isSubsetOf(other: TSet): boolean {
    return this.words.every((word, i) => (word & ~(other.words[i] ?? 0)) === 0);
  }

  public isSupersetOf(other: TSet): boolean {
    return other.isSubsetOf(this.create(this.words));
  }

  /**
   * Yields each element together with the set of elements that follow it.
   *
   * Nesting this iterator enumerates k-subsets in ascending order without
   * visiting the same unordered subset twice.
   */
  public *pivotsWithFollowing(): Generator<[T, TSet]> {
    let remaining = this.create(this.words);
    for (let pivot = remaining.first(); pivot !== null; pivot = remaining.first()) {
      remaining = remaining.without(pivot);
      yield [pivot, remaining];
    }
  }

  public toArray(): T[] {
    return [...this];
  }

  public toString(): string {
    return `{${this.toArray().map(String).join(',')}}`;
  }

  public union(other: TSet): TSet {
    return this.create(this.words.map((word, i) => (word | (other.words[i] ?? 0)) >>> 0));
  }

  public with(value: T): TSet {
    const index = checkedIndex(this.semantics, value);
    const wordIndex = index >>> WORD_INDEX_SHIFT;
    return this.create(this.words.map((word, i) => (i === wordIndex ? (word | (1 << (index & WORD_OFFSET_MASK))) >>> 0 : word)));
  }

  public without(value: T): TSet {
    const index = checkedIndex(this.semantics, value);
    const wordIndex = index >>> WORD_INDEX_SHIFT;
    return this.create(this.words.map((word, i) => (i === wordIndex ? (word & ~(1 << (index & WORD_OFFSET_MASK))) >>> 0 : word)));
  }

  protected abstract create(words: readonly number[]): TSet;
}

function checkedIndex<T>(semantics: BitSemantics<T>, value: T): number {
  const index = semantics.toIndex(value);
  if (!Number.isInteger(index) || index < 0 || index >= semantics.capacity) {
    throw new RangeError(`Bit index ${String(index)} is outside 0..${String(semantics.capacity - 1)}`);
  }
  return index;
}

function lowestBitIndex(word: number): number {
  return HIGHEST_BIT_INDEX - Math.clz32(word & -word);
}

function popCount(word: number): number {
  let v = word - ((word >>> 1) & POPCOUNT_M1);
  v = (v & POPCOUNT_M2) + ((v >>> POPCOUNT_SHIFT_2) & POPCOUNT_M2);
  return Math.imul((v + (v >>> POPCOUNT_SHIFT_4)) & POPCOUNT_M4, POPCOUNT_H01) >>> POPCOUNT_SHIFT_24;
}

function wordCount(capacity: number): number {
  return Math.ceil(capacity / WORD_BITS);
}

function wordMask(capacity: number, wordIndex: number): number {
  const bits = Math.min(WORD_BITS, capacity - wordIndex * WORD_BITS);
  return bits >= WORD_BITS ? FULL_WORD : ((1 << bits) - 1) >>> 0;
}
