export type ErrorCode =
  | 'MALFORMED_INPUT'
  | 'NOT_FOUND'
  | 'CORRUPT_CONTAINER'
  | 'PRECONDITION_VIOLATION'
  | 'PARSE_ERROR';

/**
 * Base class of every error the core reports. `code` is stable and doubles
 * as a lookup key for whatever presentation layer shows the message.
 */
export abstract class CoreError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A field or line could not be interpreted. */
export class MalformedInputError extends CoreError {
  readonly code = 'MALFORMED_INPUT';

  constructor(
    message: string,
    readonly field?: string,
    readonly found?: unknown,
  ) {
    super(message);
  }
}

/** A file, directory or index that does not exist. */
export class NotFoundError extends CoreError {
  readonly code = 'NOT_FOUND';

  constructor(
    message: string,
    readonly target: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** A persisted project that cannot be restored. */
export class CorruptContainerError extends CoreError {
  readonly code = 'CORRUPT_CONTAINER';

  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** A caller-side requirement failed, e.g. an output path that cannot be written. */
export class PreconditionError extends CoreError {
  readonly code = 'PRECONDITION_VIOLATION';
}

/** UST input that is unreadable or has no recognizable chunk. */
export class ParseError extends CoreError {
  readonly code = 'PARSE_ERROR';

  constructor(
    message: string,
    readonly source?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type Result<T, E extends CoreError = CoreError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends CoreError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
