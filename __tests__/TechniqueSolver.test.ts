import {
  describe,
  expect,
  it
} from 'vitest';

import {
  ConsistencyError,
  SolverError
} from '../src/errors.ts';
import { parseDigitGrid } from '../src/parsers.ts';
import { Position } from '../src/Position.ts';
import {
  createDefaultTechniques,
  createFundamentalTechniques,
  createTechniquesUpToTier
} from '../src/techniques/createDefaultTechniques.ts';
import { NakedSingleTechnique } from '../src/techniques/NakedSingleTechnique.ts';
import { TechniqueGrid } from '../src/TechniqueGrid.ts';
import { TechniqueSolver } from '../src/TechniqueSolver.ts';
import {
  LOCKED_CANDIDATES_PUZZLE,
  LOCKED_CANDIDATES_SOLUTION,
  SKYSCRAPER_PUZZLE,
  SKYSCRAPER_SOLUTION,
  WARM_UP,
  WARM_UP_SOLUTION,
  Y_WING_PUZZLE,
  Y_WING_SOLUTION
} from './fixtures.ts';
import { solveStepwise } from './techniqueTester.ts';

const TWO_FIVES_IN_ROW_1 = `5${'_'.repeat(7)}5${'_'.repeat(72)}`;

function gridOf(text: string): TechniqueGrid {
  return TechniqueGrid.fromDigitGrid(parseDigitGrid(text));
}

describe('TechniqueSolver', () => {
  it('makes no progress on an empty grid', () => {
    const { solved, stats } = TechniqueSolver.withAllTechniques().solve(TechniqueGrid.empty());
    expect(solved).toBe(false);
    expect(stats.totalSteps).toBe(0);
    expect(stats.hasProgress()).toBe(false);
  });

  it('solves with singles only', () => {
    const grid = TechniqueGrid.fromDigitGrid(parseDigitGrid(WARM_UP));
    const { solved, stats } = new TechniqueSolver(createFundamentalTechniques()).solve(grid);
    expect(solved).toBe(true);
    expect(grid.toDigitGrid().equals(parseDigitGrid(WARM_UP_SOLUTION))).toBe(true);
    expect(stats.toRecord()).toEqual({ 'Hidden Single': 2, 'Naked Single': 10 });
    expect(stats.totalSteps).toBe(12);
    expect(stats.hardestTier()).toBe('Fundamental');
  });

  it('tries cheaper techniques first', () => {
    const grid = TechniqueGrid.fromDigitGrid(parseDigitGrid(WARM_UP));
    const { solved, stats } = TechniqueSolver.withAllTechniques().solve(grid);
    expect(solved).toBe(true);
    expect(stats.totalSteps).toBe(12);
    expect(stats.countOf('Locked Candidates')).toBe(0);
  });

  it('finds the next step without changing the grid', () => {
    const grid = TechniqueGrid.fromDigitGrid(parseDigitGrid(WARM_UP));
    const step = TechniqueSolver.withAllTechniques().findStep(grid);
    expect(step?.note).toBe('Naked Single: r1c8=1');
    expect(grid.decidedPropagated.isEmpty()).toBe(true);
    expect(grid.candidatesAt(Position.at(0, 0)).size).toBe(9);
    expect(TechniqueSolver.withAllTechniques().findStep(TechniqueGrid.empty())).toBeNull();
  });

  it('records the technique that made progress', () => {
    const solver = TechniqueSolver.withAllTechniques();
    const grid = TechniqueGrid.empty();
    grid.place(Position.at(0, 0), 1);
    const stats = solver.newStats();
    expect(solver.step(grid, stats)).toBe(true);
    expect(stats.applications[0]).toBe(1);
    expect(stats.totalSteps).toBe(1);
  });

  it('copies the technique list', () => {
    const techniques = [new NakedSingleTechnique()];
    const solver = new TechniqueSolver(techniques);
    techniques.pop();
    expect(solver.techniques).toHaveLength(1);
  });

  it('aborts on a broken grid', () => {
    const grid = TechniqueGrid.fromDigitGrid(parseDigitGrid(TWO_FIVES_IN_ROW_1));
    const solver = TechniqueSolver.withAllTechniques();
    let caught: unknown = null;
    try {
      solver.solve(grid);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(SolverError);
    expect(caught).toMatchObject({ message: 'Digit 5 is decided more than once in Row 1: r1c1 r1c9' });
    expect(caught instanceof SolverError && caught.reason instanceof ConsistencyError).toBe(true);
    expect(() => solver.findStep(grid)).toThrow(SolverError);
  });
});

describe('TechniqueSolver beyond singles', () => {
  it('needs Locked Candidates once', () => {
    const grid = gridOf(LOCKED_CANDIDATES_PUZZLE);
    const { solved, stats } = solveStepwise(createDefaultTechniques(), grid);
    expect(solved).toBe(true);
    expect(grid.toDigitGrid().equals(parseDigitGrid(LOCKED_CANDIDATES_SOLUTION))).toBe(true);
    expect(stats.toRecord()).toEqual({
      'Hidden Single': 3,
      'Locked Candidates': 1,
      'Naked Single': 20
    });
    expect(stats.totalSteps).toBe(24);
    expect(stats.hardestTier()).toBe('Basic');
  });

  it('stalls on the Locked Candidates puzzle with singles only', () => {
    const grid = gridOf(LOCKED_CANDIDATES_PUZZLE);
    const { solved, stats } = new TechniqueSolver(createTechniquesUpToTier('Fundamental')).solve(grid);
    expect(solved).toBe(false);
    expect(stats.toRecord()).toEqual({ 'Hidden Single': 3, 'Naked Single': 8 });
    expect(grid.decidedCells().size).toBe(40);
  });

  it('needs a Skyscraper after the subsets run dry', () => {
    const grid = gridOf(SKYSCRAPER_PUZZLE);
    const { solved, stats } = solveStepwise(createDefaultTechniques(), grid);
    expect(solved).toBe(true);
    expect(grid.toDigitGrid().equals(parseDigitGrid(SKYSCRAPER_SOLUTION))).toBe(true);
    expect(stats.toRecord()).toEqual({
      'Hidden Single': 5,
      'Locked Candidates': 1,
      'Naked Single': 22,
      'Naked Triple': 1,
      'Skyscraper': 1
    });
    expect(stats.totalSteps).toBe(30);
    expect(stats.hardestTier()).toBe('UpperIntermediate');
  });

  it('stalls on the Skyscraper puzzle below UpperIntermediate', () => {
    const fundamental = gridOf(SKYSCRAPER_PUZZLE);
    expect(new TechniqueSolver(createTechniquesUpToTier('Fundamental')).solve(fundamental).solved).toBe(false);
    expect(fundamental.decidedCells().size).toBe(51);

    const grid = gridOf(SKYSCRAPER_PUZZLE);
    const { solved, stats } = new TechniqueSolver(createTechniquesUpToTier('Intermediate')).solve(grid);
    expect(solved).toBe(false);
    expect(stats.toRecord()).toEqual({
      'Hidden Single': 5,
      'Locked Candidates': 1,
      'Naked Single': 13,
      'Naked Triple': 1
    });
    expect(grid.decidedCells().size).toBe(52);
  });

  it('needs a Y-Wing after everything cheaper', () => {
    const grid = gridOf(Y_WING_PUZZLE);
    const { solved, stats } = solveStepwise(createDefaultTechniques(), grid);
    expect(solved).toBe(true);
    expect(grid.toDigitGrid().equals(parseDigitGrid(Y_WING_SOLUTION))).toBe(true);
    expect(stats.toRecord()).toEqual({
      'Hidden Pair': 1,
      'Hidden Single': 4,
      'Locked Candidates': 2,
      'Naked Pair': 2,
      'Naked Single': 18,
      'Naked Triple': 1,
      'Y-Wing': 1
    });
    expect(stats.totalSteps).toBe(29);
    expect(stats.hardestTier()).toBe('Advanced');
  });

  it('stalls on the Y-Wing puzzle below Advanced', () => {
    const fundamental = gridOf(Y_WING_PUZZLE);
    expect(new TechniqueSolver(createTechniquesUpToTier('Fundamental')).solve(fundamental).solved).toBe(false);
    expect(fundamental.decidedCells().size).toBe(43);

    const grid = gridOf(Y_WING_PUZZLE);
    const { solved, stats } = new TechniqueSolver(createTechniquesUpToTier('UpperIntermediate')).solve(grid);
    expect(solved).toBe(false);
    expect(stats.hardestTier()).toBe('Intermediate');
    expect(stats.totalSteps).toBe(21);
    expect(grid.decidedCells().size).toBe(45);
  });

  it('matches the stepwise counts', () => {
    for (const puzzle of [LOCKED_CANDIDATES_PUZZLE, SKYSCRAPER_PUZZLE, Y_WING_PUZZLE]) {
      const solverStats = TechniqueSolver.withAllTechniques().solve(gridOf(puzzle)).stats;
      const stepwiseStats = solveStepwise(createDefaultTechniques(), gridOf(puzzle)).stats;
      expect(solverStats.applications).toEqual(stepwiseStats.applications);
    }
  });
});
