/** Value that marks an identifier not yet issued by the store. */
export const UNASSIGNED_ID = 0;

/**
 * Integer identifier issued by the store.
 * Zero or negative values stand for "not persisted yet".
 */
export abstract class NumericId {
  protected constructor(public readonly value: number) {}

  isAssigned(): boolean {
    return this.value > UNASSIGNED_ID;
  }

  equals(other: this): boolean {
    return this.value === other.value;
  }

  compareTo(other: this): number {
    return this.value - other.value;
  }

  toString(): string {
    return String(this.value);
  }

  toJSON(): number {
    return this.value;
  }
}
