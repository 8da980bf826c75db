import type { TechniqueGrid } from '../TechniqueGrid.ts';
import type { TechniqueStep } from '../TechniqueStep.ts';

/**
 * Difficulty ranks, easiest first.
 */
export const TECHNIQUE_TIERS = [
  'Fundamental',
  'Basic',
  'Intermediate',
  'UpperIntermediate',
  'Advanced',
  'Expert'
] as const;

export type TechniqueTier = typeof TECHNIQUE_TIERS[number];

export interface Technique {
  readonly name: string;
  readonly tier: TechniqueTier;

  /**
   * Applies every deduction the technique finds in one pass. Returns `true` iff
   * any candidate changed.
   */
  apply(grid: TechniqueGrid): boolean;

  /**
   * Returns the first deduction in scan order without mutating `grid`.
   */
  findStep(grid: TechniqueGrid): null | TechniqueStep;
}

export function isTechniqueTier(value: unknown): value is TechniqueTier {
  return TECHNIQUE_TIERS.some((tier) => tier === value);
}

export function tierRank(tier: TechniqueTier): number {
  return TECHNIQUE_TIERS.indexOf(tier);
}
