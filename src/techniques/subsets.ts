import type { TechniqueTier } from './Technique.ts';

export interface SubsetKind {
  readonly label: string;
  readonly tier: TechniqueTier;
}

const PAIR_SIZE = 2;
const TRIPLE_SIZE = 3;
const QUAD_SIZE = 4;

export const MIN_SUBSET_SIZE = PAIR_SIZE;
export const MAX_SUBSET_SIZE = QUAD_SIZE;

const SUBSET_KINDS = new Map<number, SubsetKind>([
  [PAIR_SIZE, { label: 'Pair', tier: 'Basic' }],
  [TRIPLE_SIZE, { label: 'Triple', tier: 'Intermediate' }],
  [QUAD_SIZE, { label: 'Quad', tier: 'UpperIntermediate' }]
]);

export function getSubsetKind(subsetSize: number): SubsetKind {
  const kind = SUBSET_KINDS.get(subsetSize);
  if (!kind) {
    throw new RangeError(`Subset size must be ${String(MIN_SUBSET_SIZE)}..${String(MAX_SUBSET_SIZE)}, got ${String(subsetSize)}`);
  }
  return kind;
}
