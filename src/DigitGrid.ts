import type { Digit } from './Digit.ts';

import { Position } from './Position.ts';

const CELL_COUNT = 81;

/**
 * Plain 81-cell board: a digit or `null` per cell, no candidates.
 */
export class DigitGrid {
  public get filledCount(): number {
    return this.cells.filter((cell) => cell !== null).length;
  }

  private readonly cells: (null | Digit)[];

  public constructor(cells?: readonly (null | Digit)[]) {
    if (cells !== undefined && cells.length !== CELL_COUNT) {
      throw new Error(`A grid has ${String(CELL_COUNT)} cells, got ${String(cells.length)}`);
    }
    this.cells = cells === undefined ? Array.from({ length: CELL_COUNT }, () => null) : [...cells];
  }

  public clone(): DigitGrid {
    return new DigitGrid(this.cells);
  }

  public equals(other: DigitGrid): boolean {
    return Position.ALL.every((pos) => this.get(pos) === other.get(pos));
  }

  public get(position: Position): null | Digit {
    return this.cells[position.index] ?? null;
  }

  public set(position: Position, digit: null | Digit): void {
    this.cells[position.index] = digit;
  }
}
