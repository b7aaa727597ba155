/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * An ETL run meets three kinds of expected failure, and each one has a
 * different blast radius:
 *
 *   1. StructuralError — a record is missing a field the tables are keyed on
 *      (song_id, artist_id, userId, ts) or a source file is not valid JSON.
 *      The enclosing pipeline aborts before anything is written.
 *
 *   2. JoinMissError — a play event names a (title, artist, length) that is
 *      not in the song catalog. This one is row-local: the songplay keeps
 *      null song_id/artist_id and the run carries on.
 *
 *   3. SinkError — the table writer could not persist a table. The run
 *      aborts; rerunning is safe because every write overwrites.
 *
 * Anything else (a TypeError, a bug) is a programmer error and surfaces as-is.
 * The `isOperational` flag and the machine-readable `code` let the entry
 * point tell the two apart when it logs the failure.
 *
 * Why `Object.setPrototypeOf(this, new.target.prototype)`?
 *   When you `extends Error`, the prototype chain can break in some
 *   compilation targets, making `instanceof StructuralError` return false.
 *   This line fixes the chain so `err instanceof JoinMissError` checks in the
 *   pipelines always work.
 */
export type ErrorCode = 'STRUCTURAL_ERROR' | 'JOIN_MISS' | 'SINK_ERROR' | 'INTERNAL_ERROR';

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;

  constructor(message: string, code: ErrorCode = 'INTERNAL_ERROR', isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/** A record lacks a required field, or a source file cannot be parsed. */
export class StructuralError extends AppError {
  constructor(
    message: string,
    public readonly source?: string,
  ) {
    super(source ? `${message} (${source})` : message, 'STRUCTURAL_ERROR');
  }
}

/** A play event could not be matched to a song in the catalog. */
export class JoinMissError extends AppError {
  constructor(
    public readonly title: string | null,
    public readonly artist: string | null,
    public readonly length: number | null,
  ) {
    super(
      `No catalog match for "${title ?? '<null>'}" by "${artist ?? '<null>'}" (${length ?? '?'}s)`,
      'JOIN_MISS',
    );
  }
}

/** The table writer failed to persist a table. */
export class SinkError extends AppError {
  constructor(
    public readonly table: string,
    public readonly destination: string,
    cause: unknown,
  ) {
    super(
      `Failed to write table "${table}" to ${destination}: ${cause instanceof Error ? cause.message : String(cause)}`,
      'SINK_ERROR',
    );
    this.cause = cause;
  }
}
