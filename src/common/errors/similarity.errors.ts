/**
 * Base class for errors raised by the similarity-search core.
 */
export abstract class SimilarityError extends Error {
  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Input vector or metadata failed a shape/type check. Raised before any I/O.
 */
export class ValidationError extends SimilarityError {
  constructor(message: string) {
    super(message);
  }
}

/**
 * The backing store rejected or failed a call.
 */
export class StorageError extends SimilarityError {
  readonly cause: unknown;

  constructor(context: string, cause: unknown) {
    super(`${context}: ${describeError(cause)}`);
    this.cause = cause;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
