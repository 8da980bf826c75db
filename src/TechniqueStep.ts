import type { TechniqueApplication } from './applications/TechniqueApplication.ts';
import type { DigitPositions } from './containers/DigitPositions.ts';
import type { TechniqueGrid } from './TechniqueGrid.ts';

import { CandidateElimination } from './applications/CandidateElimination.ts';
import { DigitSet } from './containers/DigitSet.ts';
import { DIGITS } from './Digit.ts';

export type ConditionDigitCells = readonly (readonly [DigitPositions, DigitSet])[];

/**
 * A non-mutating explanation of one deduction: which cells justify it and the
 * primitive effects it implies.
 */
export interface TechniqueStep {
  readonly conditionCells: DigitPositions;
  readonly conditionDigitCells: ConditionDigitCells;
  readonly note: string;
  readonly techniqueName: string;
  application(): TechniqueApplication[];
  applyTo(grid: TechniqueGrid): boolean;
}

export interface TechniqueStepOptions {
  readonly applications: readonly TechniqueApplication[];
  readonly conditionCells: DigitPositions;
  readonly conditionDigitCells: ConditionDigitCells;
  readonly note: string;
  readonly techniqueName: string;
}

export class TechniqueStepData implements TechniqueStep {
  public readonly conditionCells: DigitPositions;
  public readonly conditionDigitCells: ConditionDigitCells;
  public readonly note: string;
  public readonly techniqueName: string;

  private readonly applications: readonly TechniqueApplication[];

  public constructor(options: TechniqueStepOptions) {
    this.applications = options.applications;
    this.conditionCells = options.conditionCells;
    this.conditionDigitCells = options.conditionDigitCells;
    this.note = options.note;
    this.techniqueName = options.techniqueName;
  }

  /**
   * Builds the application from what changed between `before` and `after`:
   * `extra` first, then one elimination per digit that lost candidates.
   */
  public static fromDiff(
    options: Omit<TechniqueStepOptions, 'applications'>,
    before: TechniqueGrid,
    after: TechniqueGrid,
    extra: readonly TechniqueApplication[] = []
  ): TechniqueStepData {
    const applications: TechniqueApplication[] = [...extra];
    for (const digit of DIGITS) {
      const removed = before.digitPositions(digit).difference(after.digitPositions(digit));
      if (!removed.isEmpty()) {
        applications.push(new CandidateElimination(removed, DigitSet.of(digit)));
      }
    }
    return new TechniqueStepData({ ...options, applications });
  }

  public application(): TechniqueApplication[] {
    return [...this.applications];
  }

  /**
   * Replays the application onto `grid` and reports whether anything changed.
   */
  public applyTo(grid: TechniqueGrid): boolean {
    let isChanged = false;
    for (const application of this.applications) {
      isChanged = application.applyTo(grid) || isChanged;
    }
    return isChanged;
  }
}
