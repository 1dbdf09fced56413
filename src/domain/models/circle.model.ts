import { DataIntegrityError, ValidationError } from '@/domain/errors';
import { err, ok, Result } from '@/domain/shared';
import { CircleId } from '@/domain/value-objects';
import { Member } from './member.model';

/** Properties for Circle aggregate. `members` never contains the owner. */
export interface CircleProps {
  id: CircleId;
  name: string;
  capacity: number;
  owner: Member;
  members: readonly Member[];
}

export interface UpdateCircleProps {
  name?: string;
  capacity?: number;
}

/**
 * Circle aggregate: a club with one owner and zero or more other members.
 * Invariant: capacity >= 1 (owner) + members.length.
 * Every change returns a new Circle; instances are never mutated.
 */
export class Circle {
  private constructor(private readonly props: CircleProps) {}

  /**
   * Builds a new, unpersisted circle whose only member is its owner.
   * @returns ValidationError when the name is blank or capacity is below 1
   */
  static create(name: string, capacity: number, owner: Member): Result<Circle, ValidationError> {
    const nameError = Circle.validateName(name);
    if (nameError) {
      return err(nameError);
    }
    if (!Number.isInteger(capacity) || capacity < 1) {
      return err(new ValidationError('capacity must be an integer of at least 1', 'capacity'));
    }

    return ok(new Circle({ id: CircleId.unassigned(), name, capacity, owner, members: [] }));
  }

  /**
   * Rehydrates a stored circle.
   * @returns DataIntegrityError when the owner also appears among `members`
   */
  static reconstruct(
    id: CircleId,
    name: string,
    owner: Member,
    capacity: number,
    members: readonly Member[],
  ): Result<Circle, DataIntegrityError> {
    if (owner.id.isAssigned() && members.some((member) => member.id.equals(owner.id))) {
      return err(new DataIntegrityError(`Owner ${owner.id.value} is listed among the members of circle ${id.value}`));
    }

    return ok(new Circle({ id, name, capacity, owner, members: [...members] }));
  }

  get id(): CircleId {
    return this.props.id;
  }

  get name(): string {
    return this.props.name;
  }

  get capacity(): number {
    return this.props.capacity;
  }

  get owner(): Member {
    return this.props.owner;
  }

  get members(): readonly Member[] {
    return this.props.members;
  }

  /** Headcount including the owner. */
  get memberCount(): number {
    return this.props.members.length + 1;
  }

  addMember(member: Member): Result<Circle, ValidationError> {
    if (this.memberCount + 1 > this.capacity) {
      return err(new ValidationError(`circle is full (capacity ${this.capacity})`, 'capacity'));
    }
    if (member.id.isAssigned() && this.hasMember(member)) {
      return err(new ValidationError(`member ${member.id.value} already belongs to the circle`, 'member'));
    }

    return ok(new Circle({ ...this.props, members: [...this.props.members, member] }));
  }

  /** Partial update: only supplied fields change. */
  update(changes: UpdateCircleProps): Result<Circle, ValidationError> {
    const name = changes.name ?? this.name;
    const capacity = changes.capacity ?? this.capacity;

    if (changes.name != null) {
      const nameError = Circle.validateName(changes.name);
      if (nameError) {
        return err(nameError);
      }
    }
    if (!Number.isInteger(capacity) || capacity < this.memberCount) {
      return err(
        new ValidationError(`capacity must be an integer of at least ${this.memberCount} (current members)`, 'capacity'),
      );
    }

    return ok(new Circle({ ...this.props, name, capacity }));
  }

  /** Aggregate equality; the order of `members` does not matter. */
  equals(other: Circle): boolean {
    if (
      !this.id.equals(other.id) ||
      this.name !== other.name ||
      this.capacity !== other.capacity ||
      !this.owner.equals(other.owner) ||
      this.members.length !== other.members.length
    ) {
      return false;
    }

    const mine = Circle.sortById(this.members);
    const theirs = Circle.sortById(other.members);
    return mine.every((member, index) => member.equals(theirs[index]));
  }

  toPlainObject(): CircleProps {
    return { ...this.props, members: [...this.props.members] };
  }

  private hasMember(member: Member): boolean {
    return this.owner.id.equals(member.id) || this.members.some((existing) => existing.id.equals(member.id));
  }

  private static validateName(name: string): ValidationError | null {
    return name.trim().length === 0 ? new ValidationError('circle name must not be empty', 'name') : null;
  }

  private static sortById(members: readonly Member[]): Member[] {
    return [...members].sort((a, b) => a.id.compareTo(b.id));
  }
}
