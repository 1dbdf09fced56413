import { DomainError } from './domain.error';

/**
 * Wraps a driver or statement failure. The message stays generic;
 * the underlying error is kept for logging only.
 */
export class StoreError extends DomainError {
  constructor(
    message: string,
    public readonly originalError?: unknown,
  ) {
    super(message, 'STORE_ERROR');
  }
}
