import type { TechniqueApplication } from '../applications/TechniqueApplication.ts';
import type { DigitPositions } from '../containers/DigitPositions.ts';
import type { TechniqueGrid } from '../TechniqueGrid.ts';
import type {
  ConditionDigitCells,
  TechniqueStep
} from '../TechniqueStep.ts';
import type {
  Technique,
  TechniqueTier
} from './Technique.ts';

import { TechniqueStepData } from '../TechniqueStep.ts';

/**
 * What a scan reports after it has changed the grid.
 */
export interface Deduction {
  readonly conditionCells: DigitPositions;
  readonly conditionDigitCells: ConditionDigitCells;
  readonly detail: string;
  readonly extra?: readonly TechniqueApplication[];
  /**
   * Appended to the technique name in the step, as in `Locked Candidates (Pointing)`.
   */
  readonly variant?: string;
}

export type DeductionHandler = (deduction: Deduction) => ScanControl;

export type ScanControl = 'continue' | 'stop';

/**
 * Implements both entry points of {@link Technique} from one scan routine.
 *
 * The scan mutates the grid it is given and calls the handler after every
 * deduction that changed candidates. `apply` runs it in place to the end;
 * `findStep` runs it on a clone, stops at the first deduction, and diffs the
 * clone against the grid it was given.
 */
export abstract class ScanningTechnique implements Technique {
  public abstract readonly name: string;
  public abstract readonly tier: TechniqueTier;

  public apply(grid: TechniqueGrid): boolean {
    let isChanged = false;
    this.scan(grid, () => {
      isChanged = true;
      return 'continue';
    });
    return isChanged;
  }

  public findStep(grid: TechniqueGrid): null | TechniqueStep {
    const after = grid.clone();
    const deductions: Deduction[] = [];
    this.scan(after, (deduction) => {
      deductions.push(deduction);
      return 'stop';
    });
    const [deduction] = deductions;
    if (deduction === undefined) {
      return null;
    }
    const techniqueName = deduction.variant === undefined ? this.name : `${this.name} (${deduction.variant})`;
    return TechniqueStepData.fromDiff(
      {
        conditionCells: deduction.conditionCells,
        conditionDigitCells: deduction.conditionDigitCells,
        note: `${techniqueName}: ${deduction.detail}`,
        techniqueName
      },
      grid,
      after,
      deduction.extra
    );
  }

  /**
   * Stops as soon as `onDeduction` returns `'stop'`. Throws a `SolverError`
   * when the scan proves the grid has no valid completion.
   */
  protected abstract scan(grid: TechniqueGrid, onDeduction: DeductionHandler): void;
}
