import type { TechniqueGrid } from '../TechniqueGrid.ts';

export type TechniqueApplicationKind = 'candidateElimination' | 'placement';

/**
 * One primitive effect of a deduction. Every step reduces to an ordered list of these.
 */
export abstract class TechniqueApplication {
  public abstract readonly kind: TechniqueApplicationKind;

  public abstract applyTo(grid: TechniqueGrid): boolean;
  public abstract toString(): string;
}
