import { Circle } from '@/domain/models';
import { CircleId } from '@/domain/value-objects';

export const CIRCLE_REPOSITORY = Symbol('CIRCLE_REPOSITORY');

/**
 * Persistence port for the Circle aggregate.
 * Each write runs as one atomic unit: either every row is written or none is.
 */
export interface CircleRepository {
  /**
   * Loads a circle with its owner and members.
   * Resolves to null when no circle row exists; rejects with
   * DataIntegrityError when the member rows do not match the circle row.
   */
  findById(id: CircleId): Promise<Circle | null>;

  /** Persists a new circle. Resolves to the stored aggregate with ids assigned. */
  create(circle: Circle): Promise<Circle>;

  /**
   * Replaces the stored circle and its whole member set.
   * Resolves to null when the circle row does not exist.
   */
  update(circle: Circle): Promise<Circle | null>;

  /** Removes the member rows, then the circle row. Resolves to false when absent. */
  delete(circle: Circle): Promise<boolean>;
}
