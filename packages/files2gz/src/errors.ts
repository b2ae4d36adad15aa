/**
 * Error types raised by the mirror pipeline and by startup validation.
 */

/** sysexits.h: command line usage error */
export const EX_USAGE = 64;
/** sysexits.h: input/output error */
export const EX_IOERR = 74;

// ─── Per-file errors ───────────────────────────────────────────────

/** Base class for failures that concern a single file. */
export class MirrorError extends Error {
  public readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'MirrorError';
    this.path = path;
  }
}

export class OutsideWatchedTreeError extends MirrorError {
  constructor(path: string, sourceRoot: string) {
    super(`Path is not inside the watched directory ${sourceRoot}`, path);
    this.name = 'OutsideWatchedTreeError';
  }
}

export class DirectoryCreateError extends MirrorError {
  constructor(path: string, cause: unknown) {
    super(`Unable to create directory: ${describeError(cause)}`, path, cause);
    this.name = 'DirectoryCreateError';
  }
}

export class SourceUnreadableError extends MirrorError {
  /** Whether a partially written destination file was left behind */
  public readonly partialOutput: boolean;

  constructor(path: string, cause: unknown, partialOutput = false) {
    super(`Unable to read source file: ${describeError(cause)}`, path, cause);
    this.name = 'SourceUnreadableError';
    this.partialOutput = partialOutput;
  }
}

export class DestinationWriteError extends MirrorError {
  /** Whether a partially written destination file was left behind */
  public readonly partialOutput: boolean;

  constructor(path: string, cause: unknown, partialOutput = false) {
    super(`Unable to write destination file: ${describeError(cause)}`, path, cause);
    this.name = 'DestinationWriteError';
    this.partialOutput = partialOutput;
  }
}

// ─── Startup errors ────────────────────────────────────────────────

/** Fatal configuration or environment problem detected before watching starts. */
export class StartupError extends Error {
  public readonly exitCode: number;

  constructor(exitCode: number, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StartupError';
    this.exitCode = exitCode;
  }
}

// ─── Utilities ─────────────────────────────────────────────────────

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/** The errno code of an OS error (e.g. "ENOENT"), if any. */
export function errorCode(err: unknown): string | undefined {
  return isErrnoException(err) ? err.code : undefined;
}

/** Short human-readable description of any thrown value. */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

/** Whether a transfer error left a partial destination file. */
export function hasPartialOutput(err: unknown): boolean {
  return (
    (err instanceof SourceUnreadableError || err instanceof DestinationWriteError) &&
    err.partialOutput
  );
}
