import type { ByteRange, RangeRequestOutcome } from './types';

export const DEFAULT_MAX_RANGES = 32;

const RANGE_SPEC = /^(\d*)\s*-\s*(\d*)$/;
const FULL_CONTENT: RangeRequestOutcome = { type: 'full' };

export interface RangeParseOptions {
  maxRanges?: number;
}

// Digits too large for a safe integer are past the end of any file.
const toOffset = (digits: string): number => {
  const value = Number(digits);
  return Number.isSafeInteger(value) ? value : Infinity;
};

/**
 * Interprets a `Range` header against a resource of `length` bytes.
 *
 * - no header, another unit, or no spec that parses at all: full content
 * - more than `maxRanges` specs: full content
 * - specs starting past the end, or with start > end, are dropped; ends past
 *   the resource are clamped; when every parsed spec is dropped the request is
 *   unsatisfiable
 *
 * Ranges come back in the order the client sent them, overlaps included.
 */
export function parseRange(
  header: string | undefined,
  length: number,
  options: RangeParseOptions = {}
): RangeRequestOutcome {
  const maxRanges = options.maxRanges ?? DEFAULT_MAX_RANGES;
  const value = header?.trim();
  if (!value) return FULL_CONTENT;

  const eq = value.indexOf('=');
  if (eq === -1) return FULL_CONTENT;
  if (value.slice(0, eq).trim().toLowerCase() !== 'bytes') return FULL_CONTENT;

  const specs = value
    .slice(eq + 1)
    .split(',')
    .map(spec => spec.trim())
    .filter(spec => spec.length > 0);
  if (specs.length === 0 || specs.length > maxRanges) return FULL_CONTENT;

  const ranges: ByteRange[] = [];
  let parsed = 0;

  for (const spec of specs) {
    const match = RANGE_SPEC.exec(spec);
    if (!match) continue;
    const [, first, last] = match;
    if (first === '' && last === '') continue;

    if (first === '') {
      const suffix = toOffset(last);
      parsed++;
      if (suffix === 0 || length === 0) continue;
      ranges.push({ start: Math.max(0, length - suffix), end: length - 1, length });
      continue;
    }

    const start = toOffset(first);
    const end = last === '' ? length - 1 : toOffset(last);
    parsed++;
    if (last !== '' && start > end) continue;
    if (start >= length) continue;
    ranges.push({ start, end: Math.min(end, length - 1), length });
  }

  if (ranges.length > 0) return { type: 'partial', ranges };
  if (parsed === 0) return FULL_CONTENT;
  return { type: 'unsatisfiable', length };
}

export interface Validators {
  etag: string;
  lastModified: number;
}

/**
 * `If-Range` check. Entity tags compare strongly (a weak tag never matches);
 * dates must equal the resource's Last-Modified to the second.
 */
export function ifRangeMatches(value: string, validators: Validators): boolean {
  const condition = value.trim();
  if (!condition) return false;
  if (condition.startsWith('W/')) return false;
  if (condition.startsWith('"')) return condition === validators.etag;

  const date = Date.parse(condition);
  if (Number.isNaN(date)) return false;
  return date === Math.floor(validators.lastModified / 1000) * 1000;
}

export const rangeSize = (range: ByteRange): number => range.end - range.start + 1;

export const formatContentRange = (range: ByteRange): string =>
  `bytes ${range.start}-${range.end}/${range.length}`;

export const formatUnsatisfiedRange = (length: number): string => `bytes */${length}`;
