import type { BitSemantics } from './BitSet.ts';

import { Position } from '../Position.ts';
import { ensureNonNullable } from '../typeGuards.ts';
import { BitSet } from './BitSet.ts';

const CELL_COUNT = 81;
const GRID_SIZE = 9;

const POSITION_SEMANTICS: BitSemantics<Position> = {
  capacity: CELL_COUNT,
  fromIndex: (index) => Position.fromIndex(index),
  toIndex: (position) => position.index
};

/**
 * A set of board cells, typically the cells where one digit is still a candidate.
 */
export class DigitPositions extends BitSet<Position, DigitPositions> {
  public static readonly EMPTY = new DigitPositions(BitSet.wordsOf(POSITION_SEMANTICS, []));
  public static readonly FULL = new DigitPositions(BitSet.fullWords(POSITION_SEMANTICS.capacity));

  public static readonly BOXES: readonly DigitPositions[] = Array.from(
    { length: GRID_SIZE },
    (_, box) => DigitPositions.fromIterable(Position.ALL.filter((pos) => pos.boxIndex === box))
  );

  public static readonly COLUMNS: readonly DigitPositions[] = Array.from(
    { length: GRID_SIZE },
    (_, x) => DigitPositions.fromIterable(Position.ALL.filter((pos) => pos.x === x))
  );

  public static readonly ROWS: readonly DigitPositions[] = Array.from(
    { length: GRID_SIZE },
    (_, y) => DigitPositions.fromIterable(Position.ALL.filter((pos) => pos.y === y))
  );

  private static readonly PEERS: readonly DigitPositions[] = Position.ALL.map(
    (pos) => DigitPositions.fromIterable(pos.housePeers())
  );

  protected readonly semantics = POSITION_SEMANTICS;

  public static box(index: number): DigitPositions {
    return ensureNonNullable(DigitPositions.BOXES[index], `Box index out of range: ${String(index)}`);
  }

  public static column(x: number): DigitPositions {
    return ensureNonNullable(DigitPositions.COLUMNS[x], `Column index out of range: ${String(x)}`);
  }

  public static fromIterable(positions: Iterable<Position>): DigitPositions {
    return new DigitPositions(BitSet.wordsOf(POSITION_SEMANTICS, positions));
  }

  /**
   * `position.housePeers()` as a set, cached per cell.
   */
  public static housePeers(position: Position): DigitPositions {
    return ensureNonNullable(DigitPositions.PEERS[position.index]);
  }

  public static of(...positions: readonly Position[]): DigitPositions {
    return DigitPositions.fromIterable(positions);
  }

  public static row(y: number): DigitPositions {
    return ensureNonNullable(DigitPositions.ROWS[y], `Row index out of range: ${String(y)}`);
  }

  public override toString(): string {
    return this.toArray().map(String).join(' ');
  }

  protected create(words: readonly number[]): DigitPositions {
    return new DigitPositions(words);
  }
}
