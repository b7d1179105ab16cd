/**
 * Errors that abort a whole extraction run.
 * Per-range problems are never thrown; they come back as skipped/failed outcomes.
 */

export class SourceNotFoundError extends Error {
  constructor(readonly path: string) {
    super(`Source PDF not found: ${path}`);
    this.name = 'SourceNotFoundError';
  }
}

export class SourceReadError extends Error {
  constructor(readonly path: string, readonly reason: string) {
    super(`Failed to read source PDF ${path}: ${reason}`);
    this.name = 'SourceReadError';
  }
}

/** Bad job file or --range flag. */
export class ExtractConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExtractConfigError';
  }
}
