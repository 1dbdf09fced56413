import { DomainError } from './domain.error';

/**
 * Stored rows cannot be rebuilt into a valid aggregate,
 * e.g. a circle whose owner_id matches none of its member rows.
 */
export class DataIntegrityError extends DomainError {
  constructor(message: string) {
    super(message, 'DATA_INTEGRITY_ERROR');
  }
}
