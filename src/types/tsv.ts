/**
 * Tab-separated record types shared by the loader and the joiner.
 */

/** One line split on tab. Fields never contain a tab; there is no quoting. */
export type Row = string[];

/** Selected fields of a row joined with a tab. */
export type JoinKey = string;

/** Join key -> tab-joined kept values from the secondary file. */
export type LookupTable = ReadonlyMap<JoinKey, string>;

export interface LookupResult {
  table: LookupTable;
  /** Tab-joined kept header names, or the literal `NA` without header mode */
  header: string;
  /** Rows read from the secondary file, header included */
  rowCount: number;
}

/** A joined primary line and whether it was the header, a hit or a miss */
export interface JoinedLine {
  fields: Row;
  kind: 'header' | 'matched' | 'unmatched';
}

export interface JoinStats {
  rows: number;
  matched: number;
  unmatched: number;
  headerWritten: boolean;
}

/**
 * Callback for streaming parse operations
 */
export type RowCallback = (row: Row, lineNumber: number) => void | Promise<void>;
