/**
 * Solve a Sudoku puzzle from a YAML file using human-style techniques only.
 *
 * Usage:
 *     npm run solve puzzles/easy.yaml
 *
 * Prints each deduction as it is made, then the final grid and how often each
 * technique was used. With `hint: true` in the file, prints only the next step.
 */

/* eslint-disable no-console -- CLI script output. */

import type { PuzzleConfig } from '../src/puzzleConfig.ts';

import {
  existsSync,
  readFileSync
} from 'node:fs';
import { basename } from 'node:path';

import {
  ConsistencyError,
  SolverError
} from '../src/errors.ts';
import { formatDigitGrid } from '../src/parsers.ts';
import { parsePuzzleConfig } from '../src/puzzleConfig.ts';
import { createTechniquesUpToTier } from '../src/techniques/createDefaultTechniques.ts';
import { TechniqueGrid } from '../src/TechniqueGrid.ts';
import { TechniqueSolver } from '../src/TechniqueSolver.ts';

const FIRST_CLI_ARG_INDEX = 2;

function main(): void {
  const puzzlePath = process.argv[FIRST_CLI_ARG_INDEX];
  if (puzzlePath === undefined) {
    console.error('Usage: npm run solve <puzzle.yaml>');
    process.exit(1);
  }
  if (!existsSync(puzzlePath)) {
    console.error(`Error: ${puzzlePath} not found`);
    process.exit(1);
  }

  let config: PuzzleConfig;
  try {
    config = parsePuzzleConfig(readFileSync(puzzlePath, 'utf-8'), basename(puzzlePath, '.yaml'));
  } catch (error: unknown) {
    console.error(`Error: ${puzzlePath}: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }

  try {
    solve(config);
  } catch (error: unknown) {
    if (error instanceof SolverError || error instanceof ConsistencyError) {
      console.error(`This board cannot be completed: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

function solve(config: PuzzleConfig): void {
  console.log(config.title);
  console.log(formatDigitGrid(config.grid));
  console.log('');

  const solver = new TechniqueSolver(createTechniquesUpToTier(config.maxTier));
  const grid = TechniqueGrid.fromDigitGrid(config.grid);

  if (config.hint) {
    const step = solver.findStep(grid);
    console.log(step === null ? 'No technique applies.' : `Hint: ${step.note}`);
    return;
  }

  const stats = solver.newStats();
  while (config.maxSteps === null || stats.totalSteps < config.maxSteps) {
    const step = solver.findStep(grid);
    if (step === null || !solver.step(grid, stats)) {
      break;
    }
    console.log(`${String(stats.totalSteps)}. ${step.note}`);
    if (grid.isSolved()) {
      break;
    }
  }

  console.log('');
  console.log(formatDigitGrid(grid.toDigitGrid()));
  console.log('');
  console.log(grid.isSolved() ? `Solved in ${String(stats.totalSteps)} steps.` : `Stuck after ${String(stats.totalSteps)} steps.`);
  for (const [name, count] of Object.entries(stats.toRecord())) {
    console.log(`  ${name}: ${String(count)}`);
  }
  const hardest = stats.hardestTier();
  if (hardest !== null) {
    console.log(`Hardest tier: ${hardest}`);
  }
}

main();
