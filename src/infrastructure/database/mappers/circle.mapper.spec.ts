import { DataIntegrityError } from '@/domain/errors';
import { Circle, Member } from '@/domain/models';
import { unwrap } from '@/domain/shared';
import { CircleId, Grade, Major, MemberId } from '@/domain/value-objects';
import { MemberEntity } from '@/infrastructure/database/entities';
import { CircleMapper, CircleRowSet } from './circle.mapper';

const memberRow = (id: number, name: string, circleId = 1): MemberEntity => ({
  id,
  name,
  age: 20,
  grade: 1,
  major: 'Math',
  circleId,
});

describe('CircleMapper', () => {
  const rowSet: CircleRowSet = {
    circle: { id: 1, name: 'Chess club', ownerId: 10, capacity: 5 },
    members: [memberRow(11, 'Bob'), memberRow(10, 'Alice'), memberRow(12, 'Carol')],
  };

  describe('toDomain', () => {
    it('should split the owner row from the other members', () => {
      const circle = unwrap(CircleMapper.toDomain(rowSet));

      expect(circle).toBeInstanceOf(Circle);
      expect(circle.id.value).toBe(1);
      expect(circle.name).toBe('Chess club');
      expect(circle.capacity).toBe(5);
      expect(circle.owner.id.value).toBe(10);
      expect(circle.owner.name).toBe('Alice');
      expect(circle.members.map((member) => member.id.value)).toEqual([11, 12]);
    });

    it('should fail when no row matches owner_id', () => {
      const result = CircleMapper.toDomain({ ...rowSet, circle: { ...rowSet.circle, ownerId: 99 } });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(DataIntegrityError);
        expect(result.error.message).toBe('Owner not found');
      }
    });

    it('should fail when there are no member rows', () => {
      const result = CircleMapper.toDomain({ ...rowSet, members: [] });

      expect(result.ok).toBe(false);
    });

    it('should fail when a member row does not parse', () => {
      const result = CircleMapper.toDomain({
        ...rowSet,
        members: [...rowSet.members, { ...memberRow(13, 'Dan'), grade: 0 }],
      });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Member 13 has invalid grade 0');
      }
    });
  });

  describe('toPersistence', () => {
    it('should put the owner row first', () => {
      const rows = CircleMapper.toPersistence(unwrap(CircleMapper.toDomain(rowSet)));

      expect(rows.circle).toEqual(rowSet.circle);
      expect(rows.members.map((row) => row.id)).toEqual([10, 11, 12]);
      expect(rows.members.every((row) => row.circleId === 1)).toBe(true);
    });

    it('should emit 0 for unassigned ids', () => {
      const owner = unwrap(Member.create('Alice', 20, unwrap(Grade.create(1)), Major.Math));
      const circle = unwrap(Circle.create('Chess club', 5, owner));

      const rows = CircleMapper.toPersistence(circle);

      expect(rows.circle).toEqual({ id: 0, name: 'Chess club', ownerId: 0, capacity: 5 });
      expect(rows.members).toEqual([memberRow(0, 'Alice', 0)]);
    });

    it('should survive a round trip', () => {
      const owner = Member.reconstruct(MemberId.of(10), 'Alice', 20, unwrap(Grade.create(1)), Major.Math);
      const member = Member.reconstruct(MemberId.of(11), 'Bob', 20, unwrap(Grade.create(1)), Major.Math);
      const circle = unwrap(Circle.reconstruct(CircleId.of(1), 'Chess club', owner, 5, [member]));

      const restored = unwrap(CircleMapper.toDomain(CircleMapper.toPersistence(circle)));

      expect(restored.equals(circle)).toBe(true);
    });
  });
});
