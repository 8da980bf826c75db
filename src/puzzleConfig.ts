import type { DigitGrid } from './DigitGrid.ts';
import type { TechniqueTier } from './techniques/Technique.ts';

import yaml from 'js-yaml';

import { parseDigitGrid } from './parsers.ts';
import {
  isTechniqueTier,
  TECHNIQUE_TIERS
} from './techniques/Technique.ts';

export interface PuzzleConfig {
  readonly grid: DigitGrid;
  readonly hint: boolean;
  readonly maxSteps: null | number;
  readonly maxTier: TechniqueTier;
  readonly title: string;
}

const KNOWN_KEYS = new Set(['grid', 'hint', 'maxSteps', 'maxTier', 'title']);

/**
 * Reads a puzzle document:
 *
 * ```yaml
 * title: Warm-up
 * maxTier: Basic
 * grid: |
 *   53_ _7_ ___
 *   ...
 * ```
 *
 * `grid` may also be a list of row strings.
 */
export function parsePuzzleConfig(text: string, defaultTitle = 'Untitled'): PuzzleConfig {
  const doc: unknown = yaml.load(text);
  if (typeof doc !== 'object' || doc === null || Array.isArray(doc)) {
    throw new Error('Puzzle file must be a mapping');
  }
  const fields = new Map<string, unknown>(Object.entries(doc));
  for (const key of fields.keys()) {
    if (!KNOWN_KEYS.has(key)) {
      throw new Error(`Unknown key: ${key}`);
    }
  }

  return {
    grid: parseDigitGrid(readGridText(fields.get('grid'))),
    hint: readHint(fields.get('hint')),
    maxSteps: readMaxSteps(fields.get('maxSteps')),
    maxTier: readMaxTier(fields.get('maxTier')),
    title: readTitle(fields.get('title'), defaultTitle)
  };
}

function readGridText(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value) && value.length > 0) {
    const rows: unknown[] = value;
    return rows.map((row, i) => {
      if (typeof row !== 'string') {
        throw new Error(`grid[${String(i)}] must be a string`);
      }
      return row;
    }).join('\n');
  }
  throw new Error('grid is required and must be a string or a list of row strings');
}

function readHint(value: unknown): boolean {
  if (value === undefined) {
    return false;
  }
  if (typeof value !== 'boolean') {
    throw new Error('hint must be true or false');
  }
  return value;
}

function readMaxSteps(value: unknown): null | number {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new Error('maxSteps must be a positive integer');
  }
  return value;
}

function readMaxTier(value: unknown): TechniqueTier {
  if (value === undefined) {
    return 'Expert';
  }
  if (!isTechniqueTier(value)) {
    throw new Error(`maxTier must be one of ${TECHNIQUE_TIERS.join(', ')}`);
  }
  return value;
}

function readTitle(value: unknown, defaultTitle: string): string {
  if (value === undefined || value === null) {
    return defaultTitle;
  }
  if (typeof value !== 'string') {
    throw new Error('title must be a string');
  }
  return value.trim() || defaultTitle;
}
