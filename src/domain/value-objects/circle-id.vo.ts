import { NumericId, UNASSIGNED_ID } from './numeric-id.vo';

export class CircleId extends NumericId {
  private readonly kind = 'CircleId' as const;

  private constructor(value: number) {
    super(value);
  }

  static of(value: number): CircleId {
    return new CircleId(value);
  }

  static unassigned(): CircleId {
    return new CircleId(UNASSIGNED_ID);
  }
}
