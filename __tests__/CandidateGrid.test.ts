import {
  describe,
  expect,
  it
} from 'vitest';

import { CandidateGrid } from '../src/CandidateGrid.ts';
import { DigitPositions } from '../src/containers/DigitPositions.ts';
import { DigitSet } from '../src/containers/DigitSet.ts';
import { ConsistencyError } from '../src/errors.ts';
import { parseDigitGrid } from '../src/parsers.ts';
import { Position } from '../src/Position.ts';
import {
  WARM_UP,
  WARM_UP_SOLUTION
} from './fixtures.ts';

const R1C1 = Position.at(0, 0);
const R1C9 = Position.at(8, 0);

describe('CandidateGrid', () => {
  it('starts with every candidate everywhere', () => {
    const grid = CandidateGrid.empty();
    expect(grid.candidatesAt(R1C1).equals(DigitSet.FULL)).toBe(true);
    expect(grid.decidedCells().isEmpty()).toBe(true);
    expect(grid.isSolved()).toBe(false);
    expect(() => {
      grid.checkConsistency();
    }).not.toThrow();
  });

  it('round-trips a digit grid', () => {
    const digits = parseDigitGrid(WARM_UP);
    const grid = CandidateGrid.fromDigitGrid(digits);
    expect(grid.decidedCells().size).toBe(33);
    expect(grid.toDigitGrid().equals(digits)).toBe(true);
  });

  it('places without touching peers', () => {
    const grid = CandidateGrid.empty();
    expect(grid.wouldPlaceChange(R1C1, 5)).toBe(true);
    expect(grid.place(R1C1, 5)).toBe(true);
    expect(grid.candidatesAt(R1C1).toString()).toBe('{5}');
    expect(grid.candidatesAt(R1C9).has(5)).toBe(true);
    expect(grid.wouldPlaceChange(R1C1, 5)).toBe(false);
    expect(grid.place(R1C1, 5)).toBe(false);
  });

  it('removes candidates and reports changes', () => {
    const grid = CandidateGrid.empty();
    expect(grid.wouldRemoveCandidateChange(R1C1, 3)).toBe(true);
    expect(grid.candidatesAt(R1C1).has(3)).toBe(true);
    expect(grid.removeCandidate(R1C1, 3)).toBe(true);
    expect(grid.removeCandidate(R1C1, 3)).toBe(false);
    expect(grid.wouldRemoveCandidateChange(R1C1, 3)).toBe(false);

    const mask = DigitPositions.of(R1C1, R1C9);
    const digits = DigitSet.of(3, 4);
    expect(grid.wouldRemoveCandidateSetWithMaskChange(mask, digits)).toBe(true);
    expect(grid.removeCandidateSetWithMask(mask, digits)).toBe(true);
    expect(grid.wouldRemoveCandidateSetWithMaskChange(mask, digits)).toBe(false);
    expect(grid.candidatesAt(R1C9).toString()).toBe('{1,2,5,6,7,8,9}');
  });

  it('buckets cells by candidate count', () => {
    const grid = CandidateGrid.empty();
    grid.removeCandidateSetWithMask(DigitPositions.of(R1C1), DigitSet.of(3, 4, 5, 6, 7, 8, 9));
    grid.place(R1C9, 4);
    const [none, single, pair] = grid.classifyCells(3);
    expect(none?.isEmpty()).toBe(true);
    expect(single?.toString()).toBe('r1c9');
    expect(pair?.toString()).toBe('r1c1');
    expect(grid.classifyCells(1)).toHaveLength(1);
    expect(() => grid.classifyCells(0)).toThrow(RangeError);
    expect(() => grid.classifyCells(11)).toThrow('Class count must be an integer in 1..10, got 11');
  });

  it('builds house masks', () => {
    const grid = CandidateGrid.empty();
    grid.removeCandidateWithMask(DigitPositions.fromIterable([0, 1, 2, 3, 4, 5, 6].map((x) => Position.at(x, 0))), 5);
    expect(grid.rowMask(0, 5).toArray()).toEqual([7, 8]);
    expect(grid.boxMask(0, 5).toArray()).toEqual([3, 4, 5, 6, 7, 8]);
    expect(grid.colMask(0, 5).toArray()).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
  });

  it('reports an empty cell', () => {
    const grid = CandidateGrid.empty();
    grid.removeCandidateSetWithMask(DigitPositions.of(R1C9), DigitSet.FULL);
    expect(() => {
      grid.checkConsistency();
    }).toThrow('No candidates left at r1c9');
  });

  it('reports a digit decided twice in a house', () => {
    const grid = CandidateGrid.empty();
    grid.place(R1C1, 5);
    grid.place(R1C9, 5);
    let caught: unknown = null;
    try {
      grid.checkConsistency();
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConsistencyError);
    expect(caught).toMatchObject({
      kind: 'CandidateConstraintViolation',
      message: 'Digit 5 is decided more than once in Row 1: r1c1 r1c9'
    });
  });

  it('recognizes a solved grid', () => {
    expect(CandidateGrid.fromDigitGrid(parseDigitGrid(WARM_UP_SOLUTION)).isSolved()).toBe(true);
    expect(CandidateGrid.fromDigitGrid(parseDigitGrid(WARM_UP)).isSolved()).toBe(false);
  });

  it('clones independently', () => {
    const grid = CandidateGrid.empty();
    const copy = grid.clone();
    expect(copy.equals(grid)).toBe(true);
    copy.removeCandidate(R1C1, 1);
    expect(grid.candidatesAt(R1C1).has(1)).toBe(true);
    expect(copy.equals(grid)).toBe(false);
  });
});
