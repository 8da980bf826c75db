import type {
  Technique,
  TechniqueTier
} from './Technique.ts';

import { HiddenSingleTechnique } from './HiddenSingleTechnique.ts';
import { HiddenSubsetTechnique } from './HiddenSubsetTechnique.ts';
import { LockedCandidatesTechnique } from './LockedCandidatesTechnique.ts';
import { NakedSingleTechnique } from './NakedSingleTechnique.ts';
import { NakedSubsetTechnique } from './NakedSubsetTechnique.ts';
import { SkyscraperTechnique } from './SkyscraperTechnique.ts';
import {
  MAX_SUBSET_SIZE,
  MIN_SUBSET_SIZE
} from './subsets.ts';
import { tierRank } from './Technique.ts';
import { XWingTechnique } from './XWingTechnique.ts';
import { YWingTechnique } from './YWingTechnique.ts';

/**
 * Every technique, cheapest tier first. Within a tier the order is fixed so
 * solving is reproducible.
 */
export function createDefaultTechniques(): Technique[] {
  const techniques: Technique[] = [
    ...createFundamentalTechniques(),
    new LockedCandidatesTechnique()
  ];
  for (let size = MIN_SUBSET_SIZE; size <= MAX_SUBSET_SIZE; size++) {
    techniques.push(new NakedSubsetTechnique(size), new HiddenSubsetTechnique(size));
  }
  techniques.push(
    new XWingTechnique(),
    new SkyscraperTechnique(),
    new YWingTechnique()
  );
  // Ties keep registration order.
  return techniques.sort((a, b) => tierRank(a.tier) - tierRank(b.tier));
}

export function createFundamentalTechniques(): Technique[] {
  return [
    new NakedSingleTechnique(),
    new HiddenSingleTechnique()
  ];
}

export function createTechniquesUpToTier(maxTier: TechniqueTier): Technique[] {
  return createDefaultTechniques().filter((technique) => tierRank(technique.tier) <= tierRank(maxTier));
}
