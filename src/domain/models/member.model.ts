import { ValidationError } from '@/domain/errors';
import { err, ok, Result } from '@/domain/shared';
import { Grade, Major, MemberId } from '@/domain/value-objects';

/** Properties for Member domain model. */
export interface MemberProps {
  id: MemberId;
  name: string;
  age: number;
  grade: Grade;
  major: Major;
}

/** A person belonging to a circle. Immutable once constructed. */
export class Member {
  private constructor(private readonly props: MemberProps) {}

  /**
   * Builds a member that has not been persisted yet.
   * Fails when the name is blank or the age is not a positive integer.
   */
  static create(name: string, age: number, grade: Grade, major: Major): Result<Member, ValidationError> {
    if (name.trim().length === 0) {
      return err(new ValidationError('member name must not be empty', 'name'));
    }
    if (!Number.isInteger(age) || age <= 0) {
      return err(new ValidationError('member age must be a positive integer', 'age'));
    }

    return ok(new Member({ id: MemberId.unassigned(), name, age, grade, major }));
  }

  /** Rehydrates a stored member. Grade and major are already validated. */
  static reconstruct(id: MemberId, name: string, age: number, grade: Grade, major: Major): Member {
    return new Member({ id, name, age, grade, major });
  }

  get id(): MemberId {
    return this.props.id;
  }

  get name(): string {
    return this.props.name;
  }

  get age(): number {
    return this.props.age;
  }

  get grade(): Grade {
    return this.props.grade;
  }

  get major(): Major {
    return this.props.major;
  }

  equals(other: Member): boolean {
    return (
      this.id.equals(other.id) &&
      this.name === other.name &&
      this.age === other.age &&
      this.grade.equals(other.grade) &&
      this.major === other.major
    );
  }

  toPlainObject(): MemberProps {
    return { ...this.props };
  }
}
