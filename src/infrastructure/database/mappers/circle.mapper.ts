import { DataIntegrityError } from '@/domain/errors';
import { Circle, Member } from '@/domain/models';
import { err, Result } from '@/domain/shared';
import { CircleId } from '@/domain/value-objects';
import { CircleEntity, MemberEntity } from '@/infrastructure/database/entities';
import { MemberMapper } from './member.mapper';

/**
 * Relational form of one Circle aggregate: its `circles` row and
 * every `members` row tagged with its id, the owner's included.
 */
export interface CircleRowSet {
  circle: CircleEntity;
  members: MemberEntity[];
}

/**
 * Data Mapper between the Circle aggregate and its row set.
 *
 * The owner lives in `members` like everyone else and is told apart only by
 * `circles.owner_id`. The aggregate keeps it out of `Circle.members`, so the
 * split and merge happen here and nowhere else.
 */
export class CircleMapper {
  /**
   * Converts an aggregate to rows.
   * The owner's row is always first in `members`; the repository relies on
   * that order to find it again when ids are not assigned yet.
   */
  static toPersistence(circle: Circle): CircleRowSet {
    const circleId = circle.id.value;

    return {
      circle: {
        id: circleId,
        name: circle.name,
        ownerId: circle.owner.id.value,
        capacity: circle.capacity,
      },
      members: [circle.owner, ...circle.members].map((member) => MemberMapper.toPersistence(member, circleId)),
    };
  }

  /**
   * Rebuilds an aggregate from its rows.
   * @returns DataIntegrityError when no row matches `owner_id` or a row does not parse
   */
  static toDomain(rowSet: CircleRowSet): Result<Circle, DataIntegrityError> {
    const { circle } = rowSet;

    let owner: Member | undefined;
    const others: Member[] = [];

    for (const row of rowSet.members) {
      const member = MemberMapper.toDomain(row);
      if (!member.ok) {
        return member;
      }

      if (row.id === circle.ownerId) {
        owner = member.value;
      } else {
        others.push(member.value);
      }
    }

    if (!owner) {
      return err(new DataIntegrityError('Owner not found'));
    }

    return Circle.reconstruct(CircleId.of(circle.id), circle.name, owner, circle.capacity, others);
  }
}
