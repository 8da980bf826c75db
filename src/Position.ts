import {
  assertGridIndex,
  ensureNonNullable
} from './typeGuards.ts';

const BOX_SIZE = 3;
const GRID_SIZE = 9;
const CELL_COUNT = 81;

/**
 * A cell address. Instances are interned, so two positions with the same
 * coordinates are the same object and can be compared with `===`.
 */
export class Position {
  public static readonly ALL: readonly Position[] = Array.from(
    { length: CELL_COUNT },
    (_, index) => new Position(index % GRID_SIZE, Math.floor(index / GRID_SIZE))
  );

  public get boxCellIndex(): number {
    return (this.y % BOX_SIZE) * BOX_SIZE + (this.x % BOX_SIZE);
  }

  public get boxIndex(): number {
    return Math.floor(this.y / BOX_SIZE) * BOX_SIZE + Math.floor(this.x / BOX_SIZE);
  }

  public get index(): number {
    return this.y * GRID_SIZE + this.x;
  }

  private constructor(public readonly x: number, public readonly y: number) {
  }

  public static at(x: number, y: number): Position {
    assertGridIndex(x, 'x');
    assertGridIndex(y, 'y');
    return Position.fromIndex(y * GRID_SIZE + x);
  }

  public static boxOrigin(boxIndex: number): Position {
    return Position.fromBox(boxIndex, 0);
  }

  public static fromBox(boxIndex: number, cellIndex: number): Position {
    assertGridIndex(boxIndex, 'box index');
    assertGridIndex(cellIndex, 'box cell index');
    const x = (boxIndex % BOX_SIZE) * BOX_SIZE + (cellIndex % BOX_SIZE);
    const y = Math.floor(boxIndex / BOX_SIZE) * BOX_SIZE + Math.floor(cellIndex / BOX_SIZE);
    return Position.at(x, y);
  }

  public static fromIndex(index: number): Position {
    return ensureNonNullable(Position.ALL[index], `Position index out of range: ${String(index)}`);
  }

  /**
   * The 20 cells that share a row, column or box with this one, in index order.
   */
  public housePeers(): readonly Position[] {
    return Position.ALL.filter(
      (other) => other !== this && (other.x === this.x || other.y === this.y || other.boxIndex === this.boxIndex)
    );
  }

  public toString(): string {
    return `r${String(this.y + 1)}c${String(this.x + 1)}`;
  }
}
