import { DigitPositions } from './containers/DigitPositions.ts';
import { Position } from './Position.ts';
import { assertGridIndex } from './typeGuards.ts';

export type HouseKind = 'box' | 'column' | 'row';

const BOX_SIZE = 3;
const GRID_SIZE = 9;

const HOUSE_KIND_LABELS: Record<HouseKind, string> = {
  box: 'Box',
  column: 'Column',
  row: 'Row'
};

/**
 * One of the 27 groups of nine cells that must hold each digit exactly once.
 */
export class House {
  public static readonly BOXES: readonly House[] = Array.from({ length: GRID_SIZE }, (_, i) => new House('box', i));
  public static readonly COLUMNS: readonly House[] = Array.from({ length: GRID_SIZE }, (_, i) => new House('column', i));
  public static readonly ROWS: readonly House[] = Array.from({ length: GRID_SIZE }, (_, i) => new House('row', i));

  public static readonly ALL: readonly House[] = [...House.ROWS, ...House.COLUMNS, ...House.BOXES];

  public get label(): string {
    return `${HOUSE_KIND_LABELS[this.kind]} ${String(this.index + 1)}`;
  }

  private readonly cellPositions: DigitPositions;

  private constructor(public readonly kind: HouseKind, public readonly index: number) {
    this.cellPositions = housePositions(kind, index);
  }

  public static box(index: number): House {
    assertGridIndex(index, 'box index');
    return House.pick(House.BOXES, index);
  }

  public static column(index: number): House {
    assertGridIndex(index, 'column index');
    return House.pick(House.COLUMNS, index);
  }

  public static row(index: number): House {
    assertGridIndex(index, 'row index');
    return House.pick(House.ROWS, index);
  }

  private static pick(houses: readonly House[], index: number): House {
    const house = houses[index];
    if (house === undefined) {
      throw new RangeError(`House index out of range: ${String(index)}`);
    }
    return house;
  }

  /**
   * The in-house index of `position`, or `null` when it lies outside this house.
   */
  public indexOf(position: Position): null | number {
    if (!this.cellPositions.has(position)) {
      return null;
    }
    switch (this.kind) {
      case 'box':
        return position.boxCellIndex;
      case 'column':
        return position.y;
      case 'row':
        return position.x;
    }
  }

  public positionAt(cellIndex: number): Position {
    assertGridIndex(cellIndex, 'cell index');
    switch (this.kind) {
      case 'box':
        return Position.fromBox(this.index, cellIndex);
      case 'column':
        return Position.at(this.index, cellIndex);
      case 'row':
        return Position.at(cellIndex, this.index);
    }
  }

  public positions(): DigitPositions {
    return this.cellPositions;
  }

  public toString(): string {
    return this.label;
  }
}

function housePositions(kind: HouseKind, index: number): DigitPositions {
  switch (kind) {
    case 'box':
      return DigitPositions.box(index);
    case 'column':
      return DigitPositions.column(index);
    case 'row':
      return DigitPositions.row(index);
  }
}

/**
 * Whether two row indices share a band of boxes, or two column indices a stack.
 */
export function isSameBand(a: number, b: number): boolean {
  return Math.floor(a / BOX_SIZE) === Math.floor(b / BOX_SIZE);
}
