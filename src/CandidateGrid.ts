import type { Digit } from './Digit.ts';

import { DigitPositions } from './containers/DigitPositions.ts';
import { DigitSet } from './containers/DigitSet.ts';
import { HouseMask } from './containers/HouseMask.ts';
import { DIGITS } from './Digit.ts';
import { DigitGrid } from './DigitGrid.ts';
import { ConsistencyError } from './errors.ts';
import { House } from './House.ts';
import { Position } from './Position.ts';
import { ensureNonNullable } from './typeGuards.ts';

const CELL_COUNT = 81;
const DECIDED_CANDIDATE_COUNT = 1;
const MAX_CANDIDATE_CLASSES = 10;

/**
 * Per-digit candidate bitboards for the whole board.
 *
 * A cell is decided when exactly one digit remains possible there. Nothing here
 * propagates a decision to peers; {@link CandidateGrid.place} only narrows the
 * cell itself, so a decided cell may still appear as a candidate in its row,
 * column and box until a technique removes it.
 */
export class CandidateGrid {
  private constructor(private readonly positionsByDigit: DigitPositions[]) {
  }

  /**
   * Every digit is a candidate in every cell.
   */
  public static empty(): CandidateGrid {
    return new CandidateGrid(DIGITS.map(() => DigitPositions.FULL));
  }

  /**
   * Places each given without removing it from peers, so the result converts
   * back to the same digit grid.
   */
  public static fromDigitGrid(grid: DigitGrid): CandidateGrid {
    const candidates = CandidateGrid.empty();
    for (const pos of Position.ALL) {
      const digit = grid.get(pos);
      if (digit !== null) {
        candidates.place(pos, digit);
      }
    }
    return candidates;
  }

  public boxMask(boxIndex: number, digit: Digit): HouseMask {
    return this.houseMask(House.box(boxIndex), digit);
  }

  public candidatesAt(position: Position): DigitSet {
    return DigitSet.fromIterable(DIGITS.filter((digit) => this.digitPositions(digit).has(position)));
  }

  public checkConsistency(): void {
    const [empty, decided] = this.classifyCells(DECIDED_CANDIDATE_COUNT + 1);
    const emptyCell = ensureNonNullable(empty).first();
    if (emptyCell !== null) {
      throw new ConsistencyError(`No candidates left at ${emptyCell.toString()}`);
    }
    for (const digit of DIGITS) {
      const decidedWithDigit = this.digitPositions(digit).intersection(ensureNonNullable(decided));
      if (decidedWithDigit.size <= 1) {
        continue;
      }
      for (const house of House.ALL) {
        const inHouse = decidedWithDigit.intersection(house.positions());
        if (inHouse.size > 1) {
          throw new ConsistencyError(`Digit ${String(digit)} is decided more than once in ${house.label}: ${inHouse.toString()}`);
        }
      }
    }
  }

  /**
   * Buckets cells by candidate count: `result[k]` holds the cells with exactly
   * `k` candidates, for `k < classCount`. Cells with more candidates appear in
   * no bucket.
   */
  public classifyCells(classCount: number): DigitPositions[] {
    if (!Number.isInteger(classCount) || classCount < 1 || classCount > MAX_CANDIDATE_CLASSES) {
      throw new RangeError(`Class count must be an integer in 1..${String(MAX_CANDIDATE_CLASSES)}, got ${String(classCount)}`);
    }
    const counts = Array.from({ length: classCount }, (_, k) => (k === 0 ? DigitPositions.FULL : DigitPositions.EMPTY));
    for (const digit of DIGITS) {
      const positions = this.digitPositions(digit);
      for (let k = classCount - 1; k >= 1; k--) {
        const staying = ensureNonNullable(counts[k]).difference(positions);
        const promoted = ensureNonNullable(counts[k - 1]).intersection(positions);
        counts[k] = staying.union(promoted);
      }
      counts[0] = ensureNonNullable(counts[0]).difference(positions);
    }
    return counts;
  }

  public clone(): CandidateGrid {
    return new CandidateGrid([...this.positionsByDigit]);
  }

  public colMask(x: number, digit: Digit): HouseMask {
    return this.houseMask(House.column(x), digit);
  }

  public decidedCells(): DigitPositions {
    return ensureNonNullable(this.classifyCells(DECIDED_CANDIDATE_COUNT + 1)[DECIDED_CANDIDATE_COUNT]);
  }

  public digitPositions(digit: Digit): DigitPositions {
    return ensureNonNullable(this.positionsByDigit[digit - 1]);
  }

  public equals(other: CandidateGrid): boolean {
    return DIGITS.every((digit) => this.digitPositions(digit).equals(other.digitPositions(digit)));
  }

  /**
   * In-house indices of the cells of `house` where `digit` is still a candidate.
   */
  public houseMask(house: House, digit: Digit): HouseMask {
    const positions = this.digitPositions(digit).intersection(house.positions());
    return HouseMask.fromIterable(Array.from(positions, (pos) => ensureNonNullable(house.indexOf(pos))));
  }

  public isSolved(): boolean {
    this.checkConsistency();
    return this.decidedCells().size === CELL_COUNT;
  }

  /**
   * Restricts the cell to `digit`. Peers keep their candidates.
   */
  public place(position: Position, digit: Digit): boolean {
    if (!this.wouldPlaceChange(position, digit)) {
      return false;
    }
    for (const other of DIGITS) {
      const positions = this.digitPositions(other);
      this.setDigitPositions(other, other === digit ? positions.with(position) : positions.without(position));
    }
    return true;
  }

  public removeCandidate(position: Position, digit: Digit): boolean {
    return this.removeCandidateWithMask(DigitPositions.of(position), digit);
  }

  /**
   * Removes `digits` from every cell of `mask`.
   */
  public removeCandidateSetWithMask(mask: DigitPositions, digits: DigitSet): boolean {
    let isChanged = false;
    for (const digit of digits) {
      isChanged = this.removeCandidateWithMask(mask, digit) || isChanged;
    }
    return isChanged;
  }

  public removeCandidateWithMask(mask: DigitPositions, digit: Digit): boolean {
    if (!this.wouldRemoveCandidateWithMaskChange(mask, digit)) {
      return false;
    }
    this.setDigitPositions(digit, this.digitPositions(digit).difference(mask));
    return true;
  }

  public rowMask(y: number, digit: Digit): HouseMask {
    return this.houseMask(House.row(y), digit);
  }

  public toDigitGrid(): DigitGrid {
    const grid = new DigitGrid();
    for (const pos of this.decidedCells()) {
      grid.set(pos, this.candidatesAt(pos).asSingle());
    }
    return grid;
  }

  public wouldPlaceChange(position: Position, digit: Digit): boolean {
    return !this.candidatesAt(position).equals(DigitSet.of(digit));
  }

  public wouldRemoveCandidateChange(position: Position, digit: Digit): boolean {
    return this.digitPositions(digit).has(position);
  }

  public wouldRemoveCandidateSetWithMaskChange(mask: DigitPositions, digits: DigitSet): boolean {
    return digits.toArray().some((digit) => this.wouldRemoveCandidateWithMaskChange(mask, digit));
  }

  public wouldRemoveCandidateWithMaskChange(mask: DigitPositions, digit: Digit): boolean {
    return !this.digitPositions(digit).intersection(mask).isEmpty();
  }

  private setDigitPositions(digit: Digit, positions: DigitPositions): void {
    this.positionsByDigit[digit - 1] = positions;
  }
}
