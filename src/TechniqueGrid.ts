import type { DigitSet } from './containers/DigitSet.ts';
import type { HouseMask } from './containers/HouseMask.ts';
import type { Digit } from './Digit.ts';
import type { DigitGrid } from './DigitGrid.ts';
import type { House } from './House.ts';
import type { Position } from './Position.ts';

import { CandidateGrid } from './CandidateGrid.ts';
import { DigitPositions } from './containers/DigitPositions.ts';

/**
 * The grid techniques operate on: candidates plus the set of decided cells
 * whose digit has already been removed from their peers.
 */
export class TechniqueGrid {
  public get decidedPropagated(): DigitPositions {
    return this.propagated;
  }

  private constructor(private readonly candidates: CandidateGrid, private propagated: DigitPositions) {
  }

  public static empty(): TechniqueGrid {
    return TechniqueGrid.fromCandidates(CandidateGrid.empty());
  }

  public static fromCandidates(candidates: CandidateGrid): TechniqueGrid {
    return new TechniqueGrid(candidates, DigitPositions.EMPTY);
  }

  public static fromDigitGrid(grid: DigitGrid): TechniqueGrid {
    return TechniqueGrid.fromCandidates(CandidateGrid.fromDigitGrid(grid));
  }

  public boxMask(boxIndex: number, digit: Digit): HouseMask {
    return this.candidates.boxMask(boxIndex, digit);
  }

  public candidatesAt(position: Position): DigitSet {
    return this.candidates.candidatesAt(position);
  }

  public checkConsistency(): void {
    this.candidates.checkConsistency();
  }

  public classifyCells(classCount: number): DigitPositions[] {
    return this.candidates.classifyCells(classCount);
  }

  public clone(): TechniqueGrid {
    return new TechniqueGrid(this.candidates.clone(), this.propagated);
  }

  public colMask(x: number, digit: Digit): HouseMask {
    return this.candidates.colMask(x, digit);
  }

  public decidedCells(): DigitPositions {
    return this.candidates.decidedCells();
  }

  public digitPositions(digit: Digit): DigitPositions {
    return this.candidates.digitPositions(digit);
  }

  /**
   * Compares candidates only; the propagation marker is bookkeeping.
   */
  public hasSameCandidates(other: TechniqueGrid): boolean {
    return this.candidates.equals(other.candidates);
  }

  public houseMask(house: House, digit: Digit): HouseMask {
    return this.candidates.houseMask(house, digit);
  }

  /**
   * A copy of the candidates, detached from this grid.
   */
  public intoCandidates(): CandidateGrid {
    return this.candidates.clone();
  }

  public isSolved(): boolean {
    return this.candidates.isSolved();
  }

  public markDecidedPropagated(position: Position): void {
    this.propagated = this.propagated.with(position);
  }

  public place(position: Position, digit: Digit): boolean {
    return this.candidates.place(position, digit);
  }

  public removeCandidate(position: Position, digit: Digit): boolean {
    return this.candidates.removeCandidate(position, digit);
  }

  public removeCandidateSetWithMask(mask: DigitPositions, digits: DigitSet): boolean {
    return this.candidates.removeCandidateSetWithMask(mask, digits);
  }

  public removeCandidateWithMask(mask: DigitPositions, digit: Digit): boolean {
    return this.candidates.removeCandidateWithMask(mask, digit);
  }

  public rowMask(y: number, digit: Digit): HouseMask {
    return this.candidates.rowMask(y, digit);
  }

  public toDigitGrid(): DigitGrid {
    return this.candidates.toDigitGrid();
  }

  public wouldPlaceChange(position: Position, digit: Digit): boolean {
    return this.candidates.wouldPlaceChange(position, digit);
  }

  public wouldRemoveCandidateChange(position: Position, digit: Digit): boolean {
    return this.candidates.wouldRemoveCandidateChange(position, digit);
  }

  public wouldRemoveCandidateSetWithMaskChange(mask: DigitPositions, digits: DigitSet): boolean {
    return this.candidates.wouldRemoveCandidateSetWithMaskChange(mask, digits);
  }

  public wouldRemoveCandidateWithMaskChange(mask: DigitPositions, digit: Digit): boolean {
    return this.candidates.wouldRemoveCandidateWithMaskChange(mask, digit);
  }
}
