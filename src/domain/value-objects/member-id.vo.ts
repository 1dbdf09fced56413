import { NumericId, UNASSIGNED_ID } from './numeric-id.vo';

export class MemberId extends NumericId {
  private readonly kind = 'MemberId' as const;

  private constructor(value: number) {
    super(value);
  }

  static of(value: number): MemberId {
    return new MemberId(value);
  }

  static unassigned(): MemberId {
    return new MemberId(UNASSIGNED_ID);
  }
}
