import type { TechniqueGrid } from '../TechniqueGrid.ts';
import type { DeductionHandler } from './ScanningTechnique.ts';
import type { TechniqueTier } from './Technique.ts';

import { Placement } from '../applications/Placement.ts';
import { DigitSet } from '../containers/DigitSet.ts';
import { DIGITS } from '../Digit.ts';
import { House } from '../House.ts';
import { ScanningTechnique } from './ScanningTechnique.ts';

export class HiddenSingleTechnique extends ScanningTechnique {
  public readonly name = 'Hidden Single';
  public readonly tier: TechniqueTier = 'Fundamental';

  protected scan(grid: TechniqueGrid, onDeduction: DeductionHandler): void {
    const decided = grid.decidedCells();
    for (const digit of DIGITS) {
      const undecided = grid.digitPositions(digit).difference(decided);
      for (const house of House.ALL) {
        const pos = undecided.intersection(house.positions()).asSingle();
        if (pos === null || !grid.place(pos, digit)) {
          continue;
        }
        const control = onDeduction({
          conditionCells: house.positions(),
          conditionDigitCells: [[house.positions(), DigitSet.of(digit)]],
          detail: `${pos.toString()}=${String(digit)} in ${house.label}`,
          extra: [new Placement(pos, digit)]
        });
        if (control === 'stop') {
          return;
        }
      }
    }
  }
}
