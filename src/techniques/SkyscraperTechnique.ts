import type { Digit } from '../Digit.ts';
import type { Position } from '../Position.ts';
import type { TechniqueGrid } from '../TechniqueGrid.ts';
import type {
  DeductionHandler,
  ScanControl
} from './ScanningTechnique.ts';
import type { TechniqueTier } from './Technique.ts';

import { DigitPositions } from '../containers/DigitPositions.ts';
import { DigitSet } from '../containers/DigitSet.ts';
import { DIGITS } from '../Digit.ts';
import {
  House,
  isSameBand
} from '../House.ts';
import { ScanningTechnique } from './ScanningTechnique.ts';

const GRID_SIZE = 9;

interface Axis {
  crossIndex(position: Position): number;
  crossLine(index: number): House;
  line(index: number): House;
}

interface StrongLine {
  readonly crossA: number;
  readonly crossB: number;
  readonly index: number;
}

const COLUMN_AXIS: Axis = {
  crossIndex: (position) => position.y,
  crossLine: (index) => House.row(index),
  line: (index) => House.column(index)
};

const ROW_AXIS: Axis = {
  crossIndex: (position) => position.x,
  crossLine: (index) => House.column(index),
  line: (index) => House.row(index)
};

/**
 * Two parallel lines, each holding a digit in exactly two cells. The lines
 * share one end (the base); the other ends (the roofs) sit in the same band of
 * boxes but on different cross lines. One roof must hold the digit, so cells
 * seeing both roofs lose it.
 */
export class SkyscraperTechnique extends ScanningTechnique {
  public readonly name = 'Skyscraper';
  public readonly tier: TechniqueTier = 'UpperIntermediate';

  protected scan(grid: TechniqueGrid, onDeduction: DeductionHandler): void {
    for (const digit of DIGITS) {
      if (this.scanAxis(grid, digit, COLUMN_AXIS, onDeduction) === 'stop') {
        return;
      }
      if (this.scanAxis(grid, digit, ROW_AXIS, onDeduction) === 'stop') {
        return;
      }
    }
  }

  private scanAxis(grid: TechniqueGrid, digit: Digit, axis: Axis, onDeduction: DeductionHandler): ScanControl {
    const positions = grid.digitPositions(digit);
    const strongLines: StrongLine[] = [];
    for (let index = 0; index < GRID_SIZE; index++) {
      const pair = positions.intersection(axis.line(index).positions()).asPair();
      if (pair === null) {
        continue;
      }
      const crossA = axis.crossIndex(pair[0]);
      const crossB = axis.crossIndex(pair[1]);
      if (!isSameBand(crossA, crossB)) {
        strongLines.push({ crossA, crossB, index });
      }
    }

    for (const [i, line1] of strongLines.entries()) {
      for (const line2 of strongLines.slice(i + 1)) {
        if (isSameBand(line1.index, line2.index)) {
          continue;
        }
        if (!isSameBand(line1.crossA, line2.crossA) || !isSameBand(line1.crossB, line2.crossB)) {
          continue;
        }

        let baseCross: number;
        let roofCross1: number;
        let roofCross2: number;
        if (line1.crossA === line2.crossA && line1.crossB !== line2.crossB) {
          baseCross = line1.crossA;
          roofCross1 = line1.crossB;
          roofCross2 = line2.crossB;
        } else if (line1.crossB === line2.crossB && line1.crossA !== line2.crossA) {
          baseCross = line1.crossB;
          roofCross1 = line1.crossA;
          roofCross2 = line2.crossA;
        } else {
          continue;
        }

        const house1 = axis.line(line1.index);
        const house2 = axis.line(line2.index);
        const roof1 = house1.positionAt(roofCross1);
        const roof2 = house2.positionAt(roofCross2);
        const eliminations = axis.crossLine(roofCross2).positions().intersection(DigitPositions.box(roof1.boxIndex))
          .union(axis.crossLine(roofCross1).positions().intersection(DigitPositions.box(roof2.boxIndex)));
        if (!grid.removeCandidateWithMask(eliminations, digit)) {
          continue;
        }

        const base = DigitPositions.of(house1.positionAt(baseCross), house2.positionAt(baseCross));
        const roofs = DigitPositions.of(roof1, roof2);
        const control = onDeduction({
          conditionCells: house1.positions().union(house2.positions()),
          conditionDigitCells: [[base.union(roofs), DigitSet.of(digit)]],
          detail: `${String(digit)} in ${house1.label} and ${house2.label}, base ${base.toString()}, roofs ${roofs.toString()}`
        });
        if (control === 'stop') {
          return 'stop';
        }
      }
    }
    return 'continue';
  }
}
