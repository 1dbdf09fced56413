import { DomainError } from './domain.error';

/** Invalid input rejected while building a value object or aggregate. */
export class ValidationError extends DomainError {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message, 'VALIDATION_ERROR');
  }
}
