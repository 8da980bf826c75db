import {
  describe,
  expect,
  it
} from 'vitest';

import { HiddenSingleTechnique } from '../src/techniques/HiddenSingleTechnique.ts';
import { NakedSingleTechnique } from '../src/techniques/NakedSingleTechnique.ts';
import { NakedSubsetTechnique } from '../src/techniques/NakedSubsetTechnique.ts';
import { YWingTechnique } from '../src/techniques/YWingTechnique.ts';
import { TechniqueSolverStats } from '../src/TechniqueSolverStats.ts';

describe('TechniqueSolverStats', () => {
  it('starts empty', () => {
    const stats = new TechniqueSolverStats([new NakedSingleTechnique()]);
    expect(stats.totalSteps).toBe(0);
    expect(stats.hasProgress()).toBe(false);
    expect(stats.hardestTier()).toBeNull();
    expect(stats.toRecord()).toEqual({});
  });

  it('counts per technique', () => {
    const stats = new TechniqueSolverStats([new NakedSingleTechnique(), new HiddenSingleTechnique(), new YWingTechnique()]);
    stats.record(0);
    stats.record(0);
    stats.record(2);
    expect(stats.applications).toEqual([2, 0, 1]);
    expect(stats.totalSteps).toBe(3);
    expect(stats.hasProgress()).toBe(true);
    expect(stats.hardestTier()).toBe('Advanced');
    expect(stats.toRecord()).toEqual({ 'Naked Single': 2, 'Y-Wing': 1 });
    expect(stats.entries[1]).toEqual({ count: 0, name: 'Hidden Single', tier: 'Fundamental' });
  });

  it('sums techniques sharing a name', () => {
    const stats = new TechniqueSolverStats([new NakedSubsetTechnique(2), new NakedSubsetTechnique(2)]);
    stats.record(0);
    stats.record(1);
    expect(stats.countOf('Naked Pair')).toBe(2);
    expect(stats.toRecord()).toEqual({ 'Naked Pair': 2 });
  });

  it('rejects unknown indices', () => {
    const stats = new TechniqueSolverStats([new NakedSingleTechnique()]);
    expect(() => {
      stats.record(5);
    }).toThrow('No technique at index 5');
  });
});
