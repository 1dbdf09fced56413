import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

/**
 * ORM Entity for the `members` table.
 * Holds every member of a circle, the owner included.
 */
@Entity('members')
export class MemberEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'integer' })
  age!: number;

  @Column({ type: 'integer' })
  grade!: number;

  @Column({ type: 'varchar', length: 255 })
  major!: string;

  @Index()
  @Column({ name: 'circle_id', type: 'integer' })
  circleId!: number;
}
