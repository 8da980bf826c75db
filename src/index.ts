export type { TechniqueApplicationKind } from './applications/TechniqueApplication.ts';
export type { BitSemantics } from './containers/BitSet.ts';
export type { Digit } from './Digit.ts';
export type { HouseKind } from './House.ts';
export type {
  Deduction,
  DeductionHandler,
  ScanControl
} from './techniques/ScanningTechnique.ts';
export type {
  Technique,
  TechniqueTier
} from './techniques/Technique.ts';
export type { SolveResult } from './TechniqueSolver.ts';
export type { TechniqueStatsEntry } from './TechniqueSolverStats.ts';
export type {
  ConditionDigitCells,
  TechniqueStep
} from './TechniqueStep.ts';

export { CandidateElimination } from './applications/CandidateElimination.ts';
export { Placement } from './applications/Placement.ts';
export { TechniqueApplication } from './applications/TechniqueApplication.ts';
export { CandidateGrid } from './CandidateGrid.ts';
export { BitSet } from './containers/BitSet.ts';
export { DigitPositions } from './containers/DigitPositions.ts';
export { DigitSet } from './containers/DigitSet.ts';
export { HouseMask } from './containers/HouseMask.ts';
export {
  DIGITS,
  isDigit
} from './Digit.ts';
export { DigitGrid } from './DigitGrid.ts';
export {
  ConsistencyError,
  SolverError
} from './errors.ts';
export {
  House,
  isSameBand
} from './House.ts';
export {
  formatDigitGrid,
  formatPosition,
  parseDigitGrid,
  parsePosition
} from './parsers.ts';
export { Position } from './Position.ts';
export {
  createDefaultTechniques,
  createFundamentalTechniques,
  createTechniquesUpToTier
} from './techniques/createDefaultTechniques.ts';
export { HiddenSingleTechnique } from './techniques/HiddenSingleTechnique.ts';
export { HiddenSubsetTechnique } from './techniques/HiddenSubsetTechnique.ts';
export { LockedCandidatesTechnique } from './techniques/LockedCandidatesTechnique.ts';
export { NakedSingleTechnique } from './techniques/NakedSingleTechnique.ts';
export { NakedSubsetTechnique } from './techniques/NakedSubsetTechnique.ts';
export { ScanningTechnique } from './techniques/ScanningTechnique.ts';
export { SkyscraperTechnique } from './techniques/SkyscraperTechnique.ts';
export {
  isTechniqueTier,
  TECHNIQUE_TIERS,
  tierRank
} from './techniques/Technique.ts';
export { XWingTechnique } from './techniques/XWingTechnique.ts';
export { YWingTechnique } from './techniques/YWingTechnique.ts';
export { TechniqueGrid } from './TechniqueGrid.ts';
export { TechniqueSolver } from './TechniqueSolver.ts';
export { TechniqueSolverStats } from './TechniqueSolverStats.ts';
export { TechniqueStepData } from './TechniqueStep.ts';
