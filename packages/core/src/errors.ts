/**
 * Error taxonomy.
 *
 * Fatal errors (NotFoundError, IOError, ConfigError) abort a run.
 * MoveError is per file: the organizer catches it, counts it and continues.
 */

export type DownsortErrorCode = 'NOT_FOUND' | 'IO' | 'MOVE' | 'CONFIG';

export abstract class DownsortError extends Error {
  abstract readonly code: DownsortErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends DownsortError {
  readonly code = 'NOT_FOUND';
}

/**
 * The directory being organized is missing or is not a directory.
 */
export class RootNotFoundError extends NotFoundError {
  constructor(readonly root: string) {
    super(`Folder not found: ${root}`);
  }
}

export class IOError extends DownsortError {
  readonly code = 'IO';
}

export class FolderCreationError extends IOError {
  constructor(readonly folderPath: string, cause: unknown) {
    super(`Cannot create folder ${folderPath}: ${describeError(cause)}`, { cause });
  }
}

export class MoveError extends DownsortError {
  readonly code = 'MOVE';

  constructor(
    readonly fileName: string,
    readonly destination: string,
    cause: unknown
  ) {
    super(`Error moving ${fileName}: ${describeError(cause)}`, { cause });
  }
}

export class ConfigError extends DownsortError {
  readonly code = 'CONFIG';
}

/**
 * Outcome of a single file move. Failures never escape the per-file loop.
 */
export type MoveResult =
  | { ok: true; destination: string }
  | { ok: false; error: MoveError };

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
