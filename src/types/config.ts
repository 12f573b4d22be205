/**
 * Resolved join options.
 *
 * Every column position here is 0-based; the 1-based positions given on the
 * command line are converted once, in `parseConfig`.
 */
export interface JoinConfig {
  /** Join-key columns in the primary (stdin) file */
  readonly firstKeyColumns: readonly number[];
  /** Join-key columns in the secondary file */
  readonly secondKeyColumns: readonly number[];
  /** Secondary columns copied into each primary row; `[0]` in fill01 mode */
  readonly keepColumns: readonly number[];
  /** Splice index for the new columns; undefined appends after the last field */
  readonly insertAt?: number;
  /** First line of both inputs is a header */
  readonly includeHeader: boolean;
  readonly prefixFirstHeader?: string;
  readonly prefixSecondHeader?: string;
  /** Insert a single 1/0 presence column instead of copied values */
  readonly fill01: boolean;
  /** Path of the secondary (lookup) file */
  readonly secondaryPath?: string;
  /** Write diagnostics to stderr */
  readonly verbose: boolean;
}
