import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';

/**
 * ORM Entity for the `circles` table.
 * `ownerId` points at the owner's row in `members`.
 */
@Entity('circles')
export class CircleEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ name: 'owner_id', type: 'integer' })
  ownerId!: number;

  @Column({ type: 'integer' })
  capacity!: number;
}
