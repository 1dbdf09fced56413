import { Inject, Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { DomainError, StoreError } from '@/domain/errors';
import { Circle } from '@/domain/models';
import { CircleRepository } from '@/domain/repositories';
import type { ILogger, LogContext } from '@/domain/services';
import { LOGGER_SERVICE } from '@/domain/services';
import { CircleId, UNASSIGNED_ID } from '@/domain/value-objects';
import { CircleEntity, MemberEntity } from '@/infrastructure/database/entities';
import { CircleMapper, CircleRowSet } from '@/infrastructure/database/mappers';

/**
 * TypeORM implementation of CircleRepository.
 *
 * A circle is one `circles` row plus one `members` row per member, the owner
 * included. Writes touch several rows, so each runs inside a single
 * transaction and a failure leaves no partial aggregate behind.
 */
@Injectable()
export class TypeOrmCircleRepository implements CircleRepository {
  constructor(
    @InjectRepository(CircleEntity)
    private readonly circles: Repository<CircleEntity>,
    @InjectRepository(MemberEntity)
    private readonly members: Repository<MemberEntity>,
    private readonly dataSource: DataSource,
    @Inject(LOGGER_SERVICE)
    private readonly logger: ILogger,
  ) {}

  /** Loads the circle row and its member rows. Members come back in id order. */
  async findById(id: CircleId): Promise<Circle | null> {
    if (!id.isAssigned()) {
      return null;
    }

    const rowSet = await this.execute('fetch circle', { circleId: id.value }, async () => {
      const circle = await this.circles.findOne({ where: { id: id.value } });
      if (!circle) {
        return null;
      }

      const members = await this.members.find({
        where: { circleId: id.value },
        order: { id: 'ASC' },
      });

      return { circle, members };
    });

    return rowSet ? this.rehydrate(rowSet) : null;
  }

  /**
   * Inserts the circle row with a placeholder owner_id, then the member rows,
   * then points owner_id at the owner's new row.
   */
  async create(circle: Circle): Promise<Circle> {
    const rows = CircleMapper.toPersistence(circle);

    const saved = await this.execute('create circle', { name: circle.name }, () =>
      this.dataSource.transaction(async (manager) => {
        const circles = manager.getRepository(CircleEntity);

        const created = await circles.save(
          circles.create({
            name: rows.circle.name,
            capacity: rows.circle.capacity,
            ownerId: UNASSIGNED_ID,
          }),
        );

        // a new circle never takes over rows that belong to another one
        const fresh = rows.members.map((row) => ({ ...row, id: UNASSIGNED_ID }));
        const members = await this.insertMembers(manager, created.id, fresh);

        created.ownerId = members[0].id;
        await circles.update({ id: created.id }, { ownerId: created.ownerId });

        return { circle: created, members };
      }),
    );

    this.logger.debug('Circle rows inserted', { circleId: saved.circle.id, members: saved.members.length });

    return this.rehydrate(saved);
  }

  /**
   * Delete-and-replace: drops every member row of the circle and inserts the
   * current member set again, then saves the circle row. Rows keep their ids.
   */
  async update(circle: Circle): Promise<Circle | null> {
    if (!circle.id.isAssigned()) {
      return null;
    }

    const rows = CircleMapper.toPersistence(circle);
    const circleId = circle.id.value;

    const saved = await this.execute('update circle', { circleId }, () =>
      this.dataSource.transaction(async (manager) => {
        const circles = manager.getRepository(CircleEntity);

        const existing = await circles.findOne({ where: { id: circleId } });
        if (!existing) {
          return null;
        }

        await manager.getRepository(MemberEntity).delete({ circleId });
        const members = await this.insertMembers(manager, circleId, rows.members);

        existing.name = rows.circle.name;
        existing.capacity = rows.circle.capacity;
        existing.ownerId = members[0].id;
        const updated = await circles.save(existing);

        return { circle: updated, members };
      }),
    );

    return saved ? this.rehydrate(saved) : null;
  }

  /** Member rows go first so none is left pointing at a missing circle. */
  async delete(circle: Circle): Promise<boolean> {
    if (!circle.id.isAssigned()) {
      return false;
    }

    const circleId = circle.id.value;

    return this.execute('delete circle', { circleId }, () =>
      this.dataSource.transaction(async (manager) => {
        const circles = manager.getRepository(CircleEntity);

        const existing = await circles.findOne({ where: { id: circleId } });
        if (!existing) {
          return false;
        }

        await manager.getRepository(MemberEntity).delete({ circleId });
        await circles.delete({ id: circleId });

        return true;
      }),
    );
  }

  /**
   * Inserts member rows in order, so the owner (first row) stays first.
   * Rows with an assigned id keep it; the rest get one from the store.
   */
  private async insertMembers(manager: EntityManager, circleId: number, rows: MemberEntity[]): Promise<MemberEntity[]> {
    const repository = manager.getRepository(MemberEntity);
    const saved: MemberEntity[] = [];

    for (const row of rows) {
      const entity = repository.create({
        ...row,
        id: row.id > UNASSIGNED_ID ? row.id : undefined,
        circleId,
      });
      saved.push(await repository.save(entity));
    }

    return saved;
  }

  /** @throws DataIntegrityError when the rows do not form a valid aggregate */
  private rehydrate(rowSet: CircleRowSet): Circle {
    const result = CircleMapper.toDomain(rowSet);

    if (!result.ok) {
      this.logger.error('Stored circle is inconsistent', {
        circleId: rowSet.circle.id,
        ownerId: rowSet.circle.ownerId,
        reason: result.error.message,
      });
      throw result.error;
    }

    return result.value;
  }

  /**
   * Runs a store operation, translating driver failures into StoreError.
   * Domain errors raised inside pass through unchanged.
   */
  private async execute<T>(operation: string, context: LogContext, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      if (error instanceof DomainError) {
        throw error;
      }

      this.logger.error(`Failed to ${operation}`, {
        ...context,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new StoreError(`Failed to ${operation}`, error);
    }
  }
}
