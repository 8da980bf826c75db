import type { Technique } from './techniques/Technique.ts';
import type { TechniqueGrid } from './TechniqueGrid.ts';
import type { TechniqueStep } from './TechniqueStep.ts';

import {
  ConsistencyError,
  SolverError
} from './errors.ts';
import { createDefaultTechniques } from './techniques/createDefaultTechniques.ts';
import { TechniqueSolverStats } from './TechniqueSolverStats.ts';

export interface SolveResult {
  readonly solved: boolean;
  readonly stats: TechniqueSolverStats;
}

/**
 * Applies techniques in a fixed priority order. Each step applies the first
 * technique that makes progress; inconsistencies abort immediately.
 */
export class TechniqueSolver {
  public get techniques(): readonly Technique[] {
    return this.orderedTechniques;
  }

  private readonly orderedTechniques: readonly Technique[];

  public constructor(techniques: readonly Technique[]) {
    this.orderedTechniques = [...techniques];
  }

  public static withAllTechniques(): TechniqueSolver {
    return new TechniqueSolver(createDefaultTechniques());
  }

  /**
   * The first step any technique can explain, without mutating `grid`.
   */
  public findStep(grid: TechniqueGrid): null | TechniqueStep {
    checkConsistency(grid);
    for (const technique of this.orderedTechniques) {
      const step = technique.findStep(grid);
      if (step !== null) {
        return step;
      }
    }
    return null;
  }

  public newStats(): TechniqueSolverStats {
    return new TechniqueSolverStats(this.orderedTechniques);
  }

  public solve(grid: TechniqueGrid): SolveResult {
    const stats = this.newStats();
    const solved = this.solveWithStats(grid, stats);
    return { solved, stats };
  }

  /**
   * Steps until the grid is solved or stuck, accumulating into `stats`.
   */
  public solveWithStats(grid: TechniqueGrid, stats: TechniqueSolverStats): boolean {
    while (this.step(grid, stats)) {
      if (isSolved(grid)) {
        return true;
      }
    }
    return isSolved(grid);
  }

  /**
   * Applies the first technique that makes progress. Returns `false` when none can.
   */
  public step(grid: TechniqueGrid, stats: TechniqueSolverStats): boolean {
    checkConsistency(grid);
    for (const [i, technique] of this.orderedTechniques.entries()) {
      if (technique.apply(grid)) {
        stats.record(i);
        checkConsistency(grid);
        return true;
      }
    }
    return false;
  }
}

function checkConsistency(grid: TechniqueGrid): void {
  try {
    grid.checkConsistency();
  } catch (error) {
    throw wrapConsistencyError(error);
  }
}

function isSolved(grid: TechniqueGrid): boolean {
  try {
    return grid.isSolved();
  } catch (error) {
    throw wrapConsistencyError(error);
  }
}

function wrapConsistencyError(error: unknown): unknown {
  return error instanceof ConsistencyError ? new SolverError(error) : error;
}
