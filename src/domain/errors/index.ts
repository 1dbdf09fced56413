export { DataIntegrityError } from './data-integrity.error';
export { DomainError } from './domain.error';
export type { DomainErrorCode } from './domain.error';
export { NotFoundError } from './not-found.error';
export { StoreError } from './store.error';
export { ValidationError } from './validation.error';
