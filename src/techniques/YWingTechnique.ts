import type { TechniqueGrid } from '../TechniqueGrid.ts';
import type { DeductionHandler } from './ScanningTechnique.ts';
import type { TechniqueTier } from './Technique.ts';

import { DigitPositions } from '../containers/DigitPositions.ts';
import { DigitSet } from '../containers/DigitSet.ts';
import { ScanningTechnique } from './ScanningTechnique.ts';

const PAIR_CLASS = 2;

/**
 * Pivot {A,B} seeing wings {A,C} and {B,C}: whichever digit the pivot takes,
 * one wing becomes C, so cells seeing both wings lose C.
 */
export class YWingTechnique extends ScanningTechnique {
  public readonly name = 'Y-Wing';
  public readonly tier: TechniqueTier = 'Advanced';

  protected scan(grid: TechniqueGrid, onDeduction: DeductionHandler): void {
    const pairCells = grid.classifyCells(PAIR_CLASS + 1)[PAIR_CLASS] ?? DigitPositions.EMPTY;
    for (const pivot of pairCells) {
      const pivotDigits = grid.candidatesAt(pivot);
      // Earlier eliminations in this pass may have narrowed the pivot.
      const pair = pivotDigits.asPair();
      if (pair === null) {
        continue;
      }
      const [d1, d2] = pair;
      const pivotPeers = DigitPositions.housePeers(pivot).intersection(pairCells);
      for (const wing1 of pivotPeers.intersection(grid.digitPositions(d1))) {
        const d3 = grid.candidatesAt(wing1).difference(pivotDigits).asSingle();
        if (d3 === null) {
          continue;
        }
        const wing2Cells = pivotPeers.intersection(grid.digitPositions(d2)).intersection(grid.digitPositions(d3));
        for (const wing2 of wing2Cells) {
          const eliminations = DigitPositions.housePeers(wing1)
            .intersection(DigitPositions.housePeers(wing2))
            .intersection(grid.digitPositions(d3));
          if (!grid.removeCandidateWithMask(eliminations, d3)) {
            continue;
          }
          const cells = DigitPositions.of(pivot, wing1, wing2);
          const control = onDeduction({
            conditionCells: cells,
            conditionDigitCells: [
              [DigitPositions.of(pivot), pivotDigits],
              [DigitPositions.of(wing1), DigitSet.of(d1, d3)],
              [DigitPositions.of(wing2), DigitSet.of(d2, d3)]
            ],
            detail: `pivot ${pivot.toString()} ${pivotDigits.toString()}, wings ${wing1.toString()} and ${wing2.toString()}, removes ${String(d3)}`
          });
          if (control === 'stop') {
            return;
          }
        }
      }
    }
  }
}
