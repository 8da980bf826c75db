import type { Digit } from '../Digit.ts';
import type { TechniqueGrid } from '../TechniqueGrid.ts';
import type {
  DeductionHandler,
  ScanControl
} from './ScanningTechnique.ts';
import type { TechniqueTier } from './Technique.ts';

import { DigitPositions } from '../containers/DigitPositions.ts';
import { DigitSet } from '../containers/DigitSet.ts';
import { DIGITS } from '../Digit.ts';
import { inconsistent } from '../errors.ts';
import {
  House,
  isSameBand
} from '../House.ts';
import { ScanningTechnique } from './ScanningTechnique.ts';

const GRID_SIZE = 9;

interface BaseLine {
  readonly crossIndices: readonly [number, number];
  readonly house: House;
}

/**
 * A digit with exactly two candidates in each of two parallel lines, at the
 * same two cross indices. The digit must occupy one diagonal of that
 * rectangle, so the rest of both cross lines loses it.
 */
export class XWingTechnique extends ScanningTechnique {
  public readonly name = 'X-Wing';
  public readonly tier: TechniqueTier = 'UpperIntermediate';

  protected scan(grid: TechniqueGrid, onDeduction: DeductionHandler): void {
    for (const digit of DIGITS) {
      if (this.scanAxis(grid, digit, 'row', onDeduction) === 'stop') {
        return;
      }
      if (this.scanAxis(grid, digit, 'column', onDeduction) === 'stop') {
        return;
      }
    }
  }

  private scanAxis(grid: TechniqueGrid, digit: Digit, axis: 'column' | 'row', onDeduction: DeductionHandler): ScanControl {
    const baseLines: BaseLine[] = [];
    for (let index = 0; index < GRID_SIZE; index++) {
      const house = axis === 'row' ? House.row(index) : House.column(index);
      const crossIndices = grid.houseMask(house, digit).asPair();
      if (crossIndices !== null) {
        baseLines.push({ crossIndices, house });
      }
    }

    for (const [i, line1] of baseLines.entries()) {
      for (const line2 of baseLines.slice(i + 1)) {
        const [cross1, cross2] = line1.crossIndices;
        if (cross1 !== line2.crossIndices[0] || cross2 !== line2.crossIndices[1]) {
          continue;
        }
        const corners = DigitPositions.of(
          line1.house.positionAt(cross1),
          line1.house.positionAt(cross2),
          line2.house.positionAt(cross1),
          line2.house.positionAt(cross2)
        );
        if (isSameBand(line1.house.index, line2.house.index) && isSameBand(cross1, cross2)) {
          throw inconsistent(`Digit ${String(digit)} needs two cells of one box at ${corners.toString()}`);
        }

        const crossLines = axis === 'row'
          ? [House.column(cross1), House.column(cross2)]
          : [House.row(cross1), House.row(cross2)];
        let eliminations = DigitPositions.EMPTY;
        for (const crossLine of crossLines) {
          eliminations = eliminations.union(crossLine.positions());
        }
        eliminations = eliminations
          .difference(line1.house.positions())
          .difference(line2.house.positions());
        if (!grid.removeCandidateWithMask(eliminations, digit)) {
          continue;
        }
        const control = onDeduction({
          conditionCells: line1.house.positions().union(line2.house.positions()),
          conditionDigitCells: [[corners, DigitSet.of(digit)]],
          detail: `${String(digit)} in ${line1.house.label} and ${line2.house.label} at ${corners.toString()}`
        });
        if (control === 'stop') {
          return 'stop';
        }
      }
    }
    return 'continue';
  }
}
