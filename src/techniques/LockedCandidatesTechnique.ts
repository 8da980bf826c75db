import type { DigitPositions } from '../containers/DigitPositions.ts';
import type { TechniqueGrid } from '../TechniqueGrid.ts';
import type {
  DeductionHandler,
  ScanControl
} from './ScanningTechnique.ts';
import type { TechniqueTier } from './Technique.ts';

import { DigitSet } from '../containers/DigitSet.ts';
import { DIGITS } from '../Digit.ts';
import { House } from '../House.ts';
import { Position } from '../Position.ts';
import { ScanningTechnique } from './ScanningTechnique.ts';

const BOX_COUNT = 9;
const BOX_SIZE = 3;

/**
 * Box/line intersections.
 *
 * Pointing: a digit's candidates in a box all lie on one line, so the rest of
 * that line loses the digit. Claiming: a digit's candidates on a line all lie in
 * one box, so the rest of that box loses it.
 */
export class LockedCandidatesTechnique extends ScanningTechnique {
  public readonly name = 'Locked Candidates';
  public readonly tier: TechniqueTier = 'Basic';

  protected scan(grid: TechniqueGrid, onDeduction: DeductionHandler): void {
    for (let boxIndex = 0; boxIndex < BOX_COUNT; boxIndex++) {
      const box = House.box(boxIndex);
      const origin = Position.boxOrigin(boxIndex);
      const lines: House[] = [];
      for (let offset = 0; offset < BOX_SIZE; offset++) {
        lines.push(House.row(origin.y + offset));
      }
      for (let offset = 0; offset < BOX_SIZE; offset++) {
        lines.push(House.column(origin.x + offset));
      }
      for (const line of lines) {
        if (this.scanIntersection(grid, box, line, onDeduction) === 'stop') {
          return;
        }
      }
    }
  }

  private scanIntersection(grid: TechniqueGrid, box: House, line: House, onDeduction: DeductionHandler): ScanControl {
    const intersection = box.positions().intersection(line.positions());
    if (intersection.difference(grid.decidedCells()).isEmpty()) {
      return 'continue';
    }
    const restInBox = box.positions().difference(intersection);
    const restInLine = line.positions().difference(intersection);
    for (const digit of DIGITS) {
      const positions = grid.digitPositions(digit);
      const locked = positions.intersection(intersection);
      if (locked.isEmpty()) {
        continue;
      }

      let variant: 'Claiming' | 'Pointing';
      let eliminations: DigitPositions;
      if (positions.intersection(restInBox).isEmpty()) {
        variant = 'Pointing';
        eliminations = positions.intersection(restInLine);
      } else if (positions.intersection(restInLine).isEmpty()) {
        variant = 'Claiming';
        eliminations = positions.intersection(restInBox);
      } else {
        continue;
      }

      if (!grid.removeCandidateWithMask(eliminations, digit)) {
        continue;
      }
      const [source, target]: [House, House] = variant === 'Pointing' ? [box, line] : [line, box];
      const control = onDeduction({
        conditionCells: box.positions().union(line.positions()),
        conditionDigitCells: [[locked, DigitSet.of(digit)]],
        detail: `${String(digit)} in ${source.label} confined to ${target.label}`,
        variant
      });
      if (control === 'stop') {
        return 'stop';
      }
    }
    return 'continue';
  }
}
