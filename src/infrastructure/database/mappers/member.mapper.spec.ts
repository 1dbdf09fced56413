import { DataIntegrityError } from '@/domain/errors';
import { Member } from '@/domain/models';
import { unwrap } from '@/domain/shared';
import { Grade, Major, MemberId } from '@/domain/value-objects';
import { MemberEntity } from '@/infrastructure/database/entities';
import { MemberMapper } from './member.mapper';

describe('MemberMapper', () => {
  const row: MemberEntity = {
    id: 3,
    name: 'Alice',
    age: 20,
    grade: 2,
    major: 'Music',
    circleId: 1,
  };

  describe('toDomain', () => {
    it('should convert a row to a Member', () => {
      const member = unwrap(MemberMapper.toDomain(row));

      expect(member).toBeInstanceOf(Member);
      expect(member.id.value).toBe(3);
      expect(member.name).toBe('Alice');
      expect(member.age).toBe(20);
      expect(member.grade.value).toBe(2);
      expect(member.major).toBe(Major.Music);
    });

    it('should accept a lower-case major', () => {
      const member = unwrap(MemberMapper.toDomain({ ...row, major: 'computerscience' }));

      expect(member.major).toBe(Major.ComputerScience);
    });

    it('should report an out-of-range grade', () => {
      const result = MemberMapper.toDomain({ ...row, grade: 7 });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(DataIntegrityError);
        expect(result.error.message).toBe('Member 3 has invalid grade 7');
      }
    });

    it('should report an unknown major', () => {
      const result = MemberMapper.toDomain({ ...row, major: 'Alchemy' });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe("Member 3 has invalid major 'Alchemy'");
      }
    });
  });

  describe('toPersistence', () => {
    it('should tag the row with the circle id', () => {
      const member = Member.reconstruct(MemberId.of(3), 'Alice', 20, unwrap(Grade.create(2)), Major.Music);

      expect(MemberMapper.toPersistence(member, 1)).toEqual(row);
    });

    it('should emit 0 for an unassigned id', () => {
      const member = unwrap(Member.create('Bob', 22, unwrap(Grade.create(4)), Major.Law));

      expect(MemberMapper.toPersistence(member, 0)).toEqual({
        id: 0,
        name: 'Bob',
        age: 22,
        grade: 4,
        major: 'Law',
        circleId: 0,
      });
    });
  });
});
