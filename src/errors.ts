export class FameError extends Error {
  readonly exitCode: number;
  constructor(message: string, exitCode = 1, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

export class UsageError extends FameError {
  constructor(message: string) { super(message, 2); }
}

/** Language table could not be read or parsed, or the repository path is unusable. */
export class ConfigError extends FameError {
  constructor(message: string, options?: { cause?: unknown }) { super(message, 2, options); }
}

export class InvalidRevisionError extends FameError {
  readonly revision: string;
  constructor(revision: string, options?: { cause?: unknown }) {
    super(`invalid revision: ${revision}`, 3, options);
    this.revision = revision;
  }
}

/** Per-file: blame failed or its output could not be attributed. */
export class AttributionError extends FameError {
  readonly file: string;
  constructor(file: string, message: string, options?: { cause?: unknown }) {
    super(message, 1, options);
    this.file = file;
  }
}

/** Per-file: no commit found for an empty file. */
export class HistoryLookupError extends FameError {
  readonly file: string;
  constructor(file: string, message: string, options?: { cause?: unknown }) {
    super(message, 1, options);
    this.file = file;
  }
}

export class RunAbortedError extends FameError {
  constructor(options?: { cause?: unknown }) { super('run aborted', 130, options); }
}

export class SerializationError extends FameError {
  constructor(message: string, options?: { cause?: unknown }) { super(message, 5, options); }
}

export type FileError = AttributionError | HistoryLookupError;

export function isFileError(err: unknown): err is FileError {
  return err instanceof AttributionError || err instanceof HistoryLookupError;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
