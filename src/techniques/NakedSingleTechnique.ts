import type { TechniqueGrid } from '../TechniqueGrid.ts';
import type { DeductionHandler } from './ScanningTechnique.ts';
import type { TechniqueTier } from './Technique.ts';

import { Placement } from '../applications/Placement.ts';
import { DigitPositions } from '../containers/DigitPositions.ts';
import { DigitSet } from '../containers/DigitSet.ts';
import { DIGITS } from '../Digit.ts';
import { ScanningTechnique } from './ScanningTechnique.ts';

/**
 * Propagation: removes the digit of every decided cell from its 20 peers.
 *
 * Each decided cell is handled once; the grid remembers which cells have been
 * propagated so later passes skip them.
 */
export class NakedSingleTechnique extends ScanningTechnique {
  public readonly name = 'Naked Single';
  public readonly tier: TechniqueTier = 'Fundamental';

  protected scan(grid: TechniqueGrid, onDeduction: DeductionHandler): void {
    const decided = grid.decidedCells();
    for (const digit of DIGITS) {
      const pending = grid.digitPositions(digit).intersection(decided).difference(grid.decidedPropagated);
      for (const pos of pending) {
        const isChanged = grid.removeCandidateWithMask(DigitPositions.housePeers(pos), digit);
        grid.markDecidedPropagated(pos);
        if (!isChanged) {
          continue;
        }
        const cell = DigitPositions.of(pos);
        const control = onDeduction({
          conditionCells: cell,
          conditionDigitCells: [[cell, DigitSet.of(digit)]],
          detail: `${pos.toString()}=${String(digit)}`,
          extra: [new Placement(pos, digit)]
        });
        if (control === 'stop') {
          return;
        }
      }
    }
  }
}
