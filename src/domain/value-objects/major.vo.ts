import { ValidationError } from '@/domain/errors';
import { err, ok, Result } from '@/domain/shared';

export enum Major {
  Math = 'Math',
  ComputerScience = 'ComputerScience',
  Economics = 'Economics',
  Law = 'Law',
  Literature = 'Literature',
  Music = 'Music',
  Other = 'Other',
}

export const MAJORS: readonly Major[] = Object.values(Major);

/**
 * Parses a major name, ignoring case and surrounding whitespace.
 * @returns The canonical enum member, or a ValidationError for unknown names
 */
export function parseMajor(raw: string): Result<Major, ValidationError> {
  const normalized = raw.trim().toLowerCase();
  const major = MAJORS.find((candidate) => candidate.toLowerCase() === normalized);

  if (major === undefined) {
    return err(new ValidationError(`major must be one of: ${MAJORS.join(', ')}`, 'major'));
  }
  return ok(major);
}
