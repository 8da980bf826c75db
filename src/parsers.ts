import type { Digit } from './Digit.ts';

import { isDigit } from './Digit.ts';
import { DigitGrid } from './DigitGrid.ts';
import { Position } from './Position.ts';
import { ensureNonNullable } from './typeGuards.ts';

const BOX_SIZE = 3;
const CELL_COUNT = 81;
const EMPTY_CELL_CHARS = new Set(['.', '0', '_']);
const GRID_SIZE = 9;

export function formatDigitGrid(grid: DigitGrid): string {
  const lines: string[] = [];
  for (let y = 0; y < GRID_SIZE; y++) {
    const groups: string[] = [];
    for (let x = 0; x < GRID_SIZE; x += BOX_SIZE) {
      let group = '';
      for (let dx = 0; dx < BOX_SIZE; dx++) {
        group += String(grid.get(Position.at(x + dx, y)) ?? '_');
      }
      groups.push(group);
    }
    lines.push(groups.join(' '));
  }
  return lines.join('\n');
}

export function formatPosition(position: Position): string {
  return position.toString();
}

/**
 * Reads a board written as digits and empty-cell markers (`.`, `_` or `0`),
 * ignoring whitespace.
 */
export function parseDigitGrid(text: string): DigitGrid {
  const cells: (null | Digit)[] = [];
  for (const ch of text) {
    if (/\s/.test(ch)) {
      continue;
    }
    if (EMPTY_CELL_CHARS.has(ch)) {
      cells.push(null);
      continue;
    }
    const value = parseInt(ch, 10);
    if (!isDigit(value)) {
      throw new Error(`Unexpected character in grid: ${ch}`);
    }
    cells.push(value);
  }
  if (cells.length !== CELL_COUNT) {
    throw new Error(`Expected ${String(CELL_COUNT)} cells, got ${String(cells.length)}`);
  }
  return new DigitGrid(cells);
}

export function parsePosition(token: string): Position {
  const m = /^r(?<row>[1-9])c(?<col>[1-9])$/.exec(token.trim().toLowerCase());
  if (!m) {
    throw new Error(`Bad cell ref: ${token}`);
  }
  const groups = ensureNonNullable(m.groups);
  return Position.at(
    parseInt(ensureNonNullable(groups['col']), 10) - 1,
    parseInt(ensureNonNullable(groups['row']), 10) - 1
  );
}
