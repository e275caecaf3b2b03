export type ErrorKind =
  | 'ValidationError'
  | 'ReferenceError'
  | 'NotFoundError'
  | 'StoreError'
  | 'RateLimitError'
  | 'InternalError';

/**
 * Base class for every failure that is reported to clients.
 * `kind` is the discriminator written into the response envelope.
 */
export abstract class ResourceError extends Error {
  abstract readonly kind: ErrorKind;
}

export class ValidationError extends ResourceError {
  readonly kind = 'ValidationError' as const;

  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * A foreign-key field names a document that does not exist.
 * (Not called ReferenceError so it does not shadow the built-in.)
 */
export class DanglingReferenceError extends ResourceError {
  readonly kind = 'ReferenceError' as const;

  constructor(
    readonly field: string,
    readonly attemptedId: unknown,
  ) {
    super(`${field} references a missing document: ${JSON.stringify(attemptedId)}`);
    this.name = 'DanglingReferenceError';
  }
}

export class NotFoundError extends ResourceError {
  readonly kind = 'NotFoundError' as const;

  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * Adapter failure. The message is safe to show to clients; the
 * underlying driver error is kept on `cause` for logging only.
 */
export class StoreError extends ResourceError {
  readonly kind = 'StoreError' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreError';
  }
}

export class RateLimitError extends ResourceError {
  readonly kind = 'RateLimitError' as const;

  constructor(message = 'Too many requests, please try again later.') {
    super(message);
    this.name = 'RateLimitError';
  }
}

export class InternalError extends ResourceError {
  readonly kind = 'InternalError' as const;

  constructor(message = 'An unexpected error occurred') {
    super(message);
    this.name = 'InternalError';
  }
}

export function isResourceError(error: unknown): error is ResourceError {
  return error instanceof ResourceError;
}
