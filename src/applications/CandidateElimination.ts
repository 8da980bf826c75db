import type { DigitPositions } from '../containers/DigitPositions.ts';
import type { DigitSet } from '../containers/DigitSet.ts';
import type { TechniqueGrid } from '../TechniqueGrid.ts';

import { TechniqueApplication } from './TechniqueApplication.ts';

/**
 * Removes every digit of `digits` from every cell of `positions`.
 */
export class CandidateElimination extends TechniqueApplication {
  public readonly kind = 'candidateElimination';

  public constructor(public readonly positions: DigitPositions, public readonly digits: DigitSet) {
    super();
  }

  public applyTo(grid: TechniqueGrid): boolean {
    return grid.removeCandidateSetWithMask(this.positions, this.digits);
  }

  public toString(): string {
    return `-${this.digits.toArray().join('')} ${this.positions.toString()}`;
  }
}
