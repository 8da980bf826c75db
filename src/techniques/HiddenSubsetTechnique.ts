import type { Digit } from '../Digit.ts';
import type { TechniqueGrid } from '../TechniqueGrid.ts';
import type {
  DeductionHandler,
  ScanControl
} from './ScanningTechnique.ts';
import type { TechniqueTier } from './Technique.ts';

import { DigitPositions } from '../containers/DigitPositions.ts';
import { DigitSet } from '../containers/DigitSet.ts';
import { inconsistent } from '../errors.ts';
import { House } from '../House.ts';
import { ScanningTechnique } from './ScanningTechnique.ts';
import { getSubsetKind } from './subsets.ts';

interface DigitSearch {
  readonly digits: DigitSet;
  readonly grid: TechniqueGrid;
  readonly house: House;
  readonly onDeduction: DeductionHandler;
  readonly positions: DigitPositions;
}

/**
 * N digits whose candidates in one house fit in the same N cells: those cells
 * can hold nothing else.
 *
 * Digits with a single cell in the house take part too, so a hidden pair may be
 * formed from a digit confined to one cell and another confined to two.
 */
export class HiddenSubsetTechnique extends ScanningTechnique {
  public readonly name: string;
  public readonly tier: TechniqueTier;

  public constructor(private readonly subsetSize: number) {
    super();
    const kind = getSubsetKind(subsetSize);
    this.name = `Hidden ${kind.label}`;
    this.tier = kind.tier;
  }

  protected scan(grid: TechniqueGrid, onDeduction: DeductionHandler): void {
    for (const house of House.ALL) {
      const search: DigitSearch = {
        digits: DigitSet.EMPTY,
        grid,
        house,
        onDeduction,
        positions: DigitPositions.EMPTY
      };
      if (this.searchDigits(search, DigitSet.FULL) === 'stop') {
        return;
      }
    }
  }

  private positionsInHouse(search: DigitSearch, digit: Digit): DigitPositions {
    return search.grid.digitPositions(digit).intersection(search.house.positions());
  }

  private searchDigits(search: DigitSearch, remaining: DigitSet): ScanControl {
    const { grid, house } = search;
    for (const [digit, following] of remaining.pivotsWithFollowing()) {
      const digitPositions = this.positionsInHouse(search, digit);
      if (digitPositions.isEmpty()) {
        continue;
      }
      const positions = search.positions.union(digitPositions);
      if (positions.size > this.subsetSize) {
        continue;
      }
      const digits = search.digits.with(digit);
      if (digits.size < this.subsetSize) {
        if (this.searchDigits({ ...search, digits, positions }, following) === 'stop') {
          return 'stop';
        }
        continue;
      }

      if (positions.size < this.subsetSize) {
        throw inconsistent(`Digits ${digits.toString()} in ${house.label} fit in only ${String(positions.size)} cells: ${positions.toString()}`);
      }
      // Earlier digits were covered by earlier combinations.
      const extraDigit = following.toArray().find((other) => {
        const otherPositions = this.positionsInHouse(search, other);
        return !otherPositions.isEmpty() && otherPositions.isSubsetOf(positions);
      });
      if (extraDigit !== undefined) {
        throw inconsistent(`Digits ${digits.with(extraDigit).toString()} in ${house.label} are confined to ${positions.toString()}`);
      }

      if (!grid.removeCandidateSetWithMask(positions, digits.complement())) {
        continue;
      }
      const control = search.onDeduction({
        conditionCells: house.positions(),
        conditionDigitCells: [[positions, digits]],
        detail: `${positions.toString()} ${digits.toString()} in ${house.label}`
      });
      if (control === 'stop') {
        return 'stop';
      }
    }
    return 'continue';
  }
}
