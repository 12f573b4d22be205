import type { JoinKey, Row } from '../types/tsv';

/**
 * Convert a comma-separated list of 1-based column positions ("1,3,4")
 * into 0-based indices. Blank and non-numeric entries are dropped; there are no ranges.
 */
export function parseColumnList(spec?: string): number[] {
  if (!spec) return [];

  return spec
    .split(',')
    .map(part => part.trim())
    .filter(part => /^-?\d+$/.test(part))
    .map(part => parseInt(part, 10) - 1);
}

/**
 * Read a field without bounds errors: anything out of range is ''.
 */
export function fieldAt(row: readonly string[], index: number): string {
  if (index < 0 || index >= row.length) return '';
  return row[index] ?? '';
}

export function pickFields(row: readonly string[], indices: readonly number[]): string[] {
  return indices.map(index => fieldAt(row, index));
}

export function joinKey(row: readonly string[], indices: readonly number[]): JoinKey {
  return pickFields(row, indices).join('\t');
}

/**
 * Insert `value` as a single field before position `at`.
 * A position past the end, or none at all, appends.
 */
export function spliceFields(row: readonly string[], at: number | undefined, value: string): Row {
  const result = [...row];
  const index = at === undefined ? result.length : Math.max(0, Math.min(at, result.length));
  result.splice(index, 0, value);
  return result;
}

/** `count` copies of `value`, tab-joined */
export function placeholder(value: string, count: number): string {
  return new Array<string>(Math.max(0, count)).fill(value).join('\t');
}
