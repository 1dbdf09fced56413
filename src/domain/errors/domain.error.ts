export type DomainErrorCode = 'VALIDATION_ERROR' | 'NOT_FOUND' | 'DATA_INTEGRITY_ERROR' | 'STORE_ERROR';

/**
 * Base class for errors raised by the circle domain and its persistence.
 * The `code` lets the presentation layer pick a status without knowing the subclass.
 */
export abstract class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: DomainErrorCode,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}
