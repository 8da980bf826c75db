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
import {
  getSubsetKind,
  MIN_SUBSET_SIZE
} from './subsets.ts';

interface CellSearch {
  readonly cells: DigitPositions;
  readonly digits: DigitSet;
  readonly grid: TechniqueGrid;
  readonly house: House;
  readonly onDeduction: DeductionHandler;
}

/**
 * N cells of one house whose candidates together are exactly N digits: those
 * digits go nowhere else in the house.
 */
export class NakedSubsetTechnique extends ScanningTechnique {
  public readonly name: string;
  public readonly tier: TechniqueTier;

  public constructor(private readonly subsetSize: number) {
    super();
    const kind = getSubsetKind(subsetSize);
    this.name = `Naked ${kind.label}`;
    this.tier = kind.tier;
  }

  protected scan(grid: TechniqueGrid, onDeduction: DeductionHandler): void {
    const classes = grid.classifyCells(this.subsetSize + 1);
    let pool = DigitPositions.EMPTY;
    for (const cells of classes.slice(MIN_SUBSET_SIZE)) {
      pool = pool.union(cells);
    }
    if (pool.size < this.subsetSize) {
      return;
    }

    for (const house of House.ALL) {
      const poolInHouse = pool.intersection(house.positions());
      if (poolInHouse.size < this.subsetSize) {
        continue;
      }
      const search: CellSearch = {
        cells: DigitPositions.EMPTY,
        digits: DigitSet.EMPTY,
        grid,
        house,
        onDeduction
      };
      if (this.searchCells(search, poolInHouse) === 'stop') {
        return;
      }
    }
  }

  private searchCells(search: CellSearch, remaining: DigitPositions): ScanControl {
    const { grid, house } = search;
    for (const [pos, following] of remaining.pivotsWithFollowing()) {
      const digits = search.digits.union(grid.candidatesAt(pos));
      if (digits.size > this.subsetSize) {
        continue;
      }
      const cells = search.cells.with(pos);
      if (cells.size < this.subsetSize) {
        if (this.searchCells({ ...search, cells, digits }, following) === 'stop') {
          return 'stop';
        }
        continue;
      }

      if (digits.size < this.subsetSize) {
        throw inconsistent(`${cells.toString()} in ${house.label} share only ${String(digits.size)} candidates ${digits.toString()}`);
      }
      // Earlier cells were covered by earlier combinations.
      const extraCell = following.toArray().find((other) => grid.candidatesAt(other).isSubsetOf(digits));
      if (extraCell !== undefined) {
        throw inconsistent(`${cells.with(extraCell).toString()} in ${house.label} are confined to ${digits.toString()}`);
      }

      const eliminations = house.positions().difference(cells);
      if (!grid.removeCandidateSetWithMask(eliminations, digits)) {
        continue;
      }
      const control = search.onDeduction({
        conditionCells: cells,
        conditionDigitCells: [[cells, digits]],
        detail: `${cells.toString()} ${digits.toString()} in ${house.label}`
      });
      if (control === 'stop') {
        return 'stop';
      }
    }
    return 'continue';
  }
}
