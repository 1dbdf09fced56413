import { ValidationError } from '@/domain/errors';
import { err, ok, Result } from '@/domain/shared';

export const MIN_GRADE = 1;
export const MAX_GRADE = 4;

/** Academic year of a member, 1 through 4. */
export class Grade {
  private constructor(public readonly value: number) {}

  static create(value: number): Result<Grade, ValidationError> {
    if (!Number.isInteger(value) || value < MIN_GRADE || value > MAX_GRADE) {
      return err(new ValidationError(`grade must be an integer between ${MIN_GRADE} and ${MAX_GRADE}`, 'grade'));
    }
    return ok(new Grade(value));
  }

  equals(other: Grade): boolean {
    return this.value === other.value;
  }

  toJSON(): number {
    return this.value;
  }
}
