import {
  describe,
  expect,
  it
} from 'vitest';

import { DigitPositions } from '../../src/containers/DigitPositions.ts';
import { parseDigitGrid } from '../../src/parsers.ts';
import { Position } from '../../src/Position.ts';
import { NakedSingleTechnique } from '../../src/techniques/NakedSingleTechnique.ts';
import { TechniqueGrid } from '../../src/TechniqueGrid.ts';
import { ensureNonNullable } from '../../src/typeGuards.ts';
import { WARM_UP } from '../fixtures.ts';
import {
  applyOnce,
  applyUntilStuck,
  assertNoChange,
  assertRemovedIncludes,
  removedPositions
} from '../techniqueTester.ts';

const R1C1 = Position.at(0, 0);

describe('NakedSingleTechnique', () => {
  const technique = new NakedSingleTechnique();

  it('removes a decided digit from all 20 peers', () => {
    const grid = TechniqueGrid.empty();
    grid.place(R1C1, 1);
    const before = grid.clone();

    expect(applyOnce(technique, grid)).toBe(true);
    expect(removedPositions(before, grid, 1).equals(DigitPositions.housePeers(R1C1))).toBe(true);
    assertRemovedIncludes(before, grid, 1, 'r1c9 r3c3 r9c1');
    expect(removedPositions(before, grid, 2).isEmpty()).toBe(true);
    expect(grid.decidedPropagated.has(R1C1)).toBe(true);
    expect(applyOnce(technique, grid)).toBe(false);
  });

  it('explains the step', () => {
    const grid = TechniqueGrid.empty();
    grid.place(R1C1, 1);
    const step = ensureNonNullable(technique.findStep(grid));
    expect(step.techniqueName).toBe('Naked Single');
    expect(step.note).toBe('Naked Single: r1c1=1');
    expect(step.conditionCells.toString()).toBe('r1c1');
    expect(step.application().map((application) => application.kind)).toEqual(['placement', 'candidateElimination']);
    expect(grid.decidedPropagated.isEmpty()).toBe(true);
  });

  it('marks a decided cell even when its peers are already clear', () => {
    const grid = TechniqueGrid.empty();
    grid.place(R1C1, 1);
    grid.removeCandidateWithMask(DigitPositions.housePeers(R1C1), 1);
    expect(technique.apply(grid)).toBe(false);
    expect(grid.decidedPropagated.has(R1C1)).toBe(true);
  });

  it('reaches a fixed point', () => {
    const grid = TechniqueGrid.fromDigitGrid(parseDigitGrid(WARM_UP));
    expect(applyUntilStuck(technique, grid)).toBe(3);
    expect(grid.decidedCells().size).toBe(37);
    assertNoChange(technique, grid);
  });

  it('does nothing without decided cells', () => {
    assertNoChange(technique, TechniqueGrid.empty());
  });
});
