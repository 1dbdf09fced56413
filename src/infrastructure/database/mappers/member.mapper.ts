import { DataIntegrityError } from '@/domain/errors';
import { Member } from '@/domain/models';
import { err, ok, Result } from '@/domain/shared';
import { Grade, MemberId, parseMajor } from '@/domain/value-objects';
import { MemberEntity } from '@/infrastructure/database/entities';

/** Data Mapper: converts between a `members` row and the Member domain model. */
export class MemberMapper {
  /**
   * Converts a stored row to a domain member.
   * Grade and major are re-parsed; a row holding values the domain rejects
   * is reported as a DataIntegrityError.
   */
  static toDomain(entity: MemberEntity): Result<Member, DataIntegrityError> {
    const grade = Grade.create(entity.grade);
    if (!grade.ok) {
      return err(new DataIntegrityError(`Member ${entity.id} has invalid grade ${entity.grade}`));
    }

    const major = parseMajor(entity.major);
    if (!major.ok) {
      return err(new DataIntegrityError(`Member ${entity.id} has invalid major '${entity.major}'`));
    }

    return ok(Member.reconstruct(MemberId.of(entity.id), entity.name, entity.age, grade.value, major.value));
  }

  /**
   * Converts a domain member to a row tagged with its circle.
   * An unassigned member id is emitted as 0.
   */
  static toPersistence(member: Member, circleId: number): MemberEntity {
    return {
      id: member.id.value,
      name: member.name,
      age: member.age,
      grade: member.grade.value,
      major: member.major,
      circleId,
    };
  }
}
