/**
 * Error taxonomy shared by the engine and the HTTP surface.
 * Each error carries a stable code and the HTTP status the server answers with.
 */

export type MemoryErrorCode =
  | 'VALIDATION_ERROR'
  | 'INVALID_TRANSITION'
  | 'NOT_FOUND'
  | 'STORE_UNAVAILABLE'
  | 'EXTERNAL_SERVICE_ERROR';

export abstract class MemoryError extends Error {
  abstract readonly code: MemoryErrorCode;
  abstract readonly status: number;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/** Rejected before any mutation: bad decision value, malformed filter, out-of-range input. */
export class ValidationError extends MemoryError {
  readonly code: MemoryErrorCode = 'VALIDATION_ERROR';
  readonly status: number = 400;
}

/** A decision that the memory's current state does not admit (e.g. anything on a deleted memory). */
export class InvalidTransitionError extends ValidationError {
  readonly code: MemoryErrorCode = 'INVALID_TRANSITION';
  readonly status: number = 409;
}

export class NotFoundError extends MemoryError {
  readonly code = 'NOT_FOUND';
  readonly status = 404;

  constructor(readonly entity: 'memory' | 'agent', readonly id: string) {
    super(`${entity} not found: ${id}`);
  }
}

/** The store could not be reached. Write-path callers fall back to the offline buffer. */
export class TransientIOError extends MemoryError {
  readonly code = 'STORE_UNAVAILABLE';
  readonly status = 503;
}

/** The embedding endpoint or the decision service failed or answered with something unusable. */
export class ExternalServiceError extends MemoryError {
  readonly code = 'EXTERNAL_SERVICE_ERROR';
  readonly status = 502;

  constructor(
    readonly service: 'embedding' | 'decision',
    message: string,
    cause?: unknown,
  ) {
    super(message, cause);
  }
}

export function isMemoryError(error: unknown): error is MemoryError {
  return error instanceof MemoryError;
}
