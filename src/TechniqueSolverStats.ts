import type {
  Technique,
  TechniqueTier
} from './techniques/Technique.ts';

import { tierRank } from './techniques/Technique.ts';

export interface TechniqueStatsEntry {
  readonly count: number;
  readonly name: string;
  readonly tier: TechniqueTier;
}

/**
 * Application counts per technique, aligned with the solver's technique order.
 */
export class TechniqueSolverStats {
  public get applications(): readonly number[] {
    return this.counts;
  }

  public get entries(): readonly TechniqueStatsEntry[] {
    return this.techniques.map((technique, i) => ({
      count: this.counts[i] ?? 0,
      name: technique.name,
      tier: technique.tier
    }));
  }

  public get totalSteps(): number {
    return this.steps;
  }

  private readonly counts: number[];
  private steps = 0;

  public constructor(private readonly techniques: readonly Technique[]) {
    this.counts = techniques.map(() => 0);
  }

  public countOf(name: string): number {
    let total = 0;
    for (const entry of this.entries) {
      if (entry.name === name) {
        total += entry.count;
      }
    }
    return total;
  }

  public hardestTier(): null | TechniqueTier {
    let hardest: null | TechniqueTier = null;
    for (const entry of this.entries) {
      if (entry.count > 0 && (hardest === null || tierRank(entry.tier) > tierRank(hardest))) {
        hardest = entry.tier;
      }
    }
    return hardest;
  }

  public hasProgress(): boolean {
    return this.steps > 0;
  }

  public record(techniqueIndex: number): void {
    const count = this.counts[techniqueIndex];
    if (count === undefined) {
      throw new RangeError(`No technique at index ${String(techniqueIndex)}`);
    }
    this.counts[techniqueIndex] = count + 1;
    this.steps++;
  }

  /**
   * Counts keyed by technique name, omitting techniques that never applied.
   */
  public toRecord(): Record<string, number> {
    const result: Record<string, number> = {};
    for (const entry of this.entries) {
      if (entry.count > 0) {
        result[entry.name] = (result[entry.name] ?? 0) + entry.count;
      }
    }
    return result;
  }
}
