export type JoinErrorCode = 'SECONDARY_FILE_UNREADABLE';

/**
 * Base class for errors the CLI reports to the user and turns into an exit code.
 */
export class JoinError extends Error {
  readonly code: JoinErrorCode;
  readonly exitCode: number;

  constructor(code: JoinErrorCode, message: string, exitCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
  }
}

/**
 * The lookup file is missing or cannot be read. Raised before any output is written.
 */
export class SecondaryFileUnreadableError extends JoinError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super('SECONDARY_FILE_UNREADABLE', `Could not read data file ${path}.`, 2, { cause });
    this.path = path;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
