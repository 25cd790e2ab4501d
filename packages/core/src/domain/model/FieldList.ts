import type { FieldValue } from './Record.js';

/**
 * Buffer for a multi-value field built from `Field:N` lines.
 *
 * Slots can be written in any order. Writing index `i` past the end pads the
 * gap with `null`, so `length` is always the highest index written plus one.
 */
export class FieldList {
  private readonly items: FieldValue[] = [];

  get length(): number {
    return this.items.length;
  }

  /** Write `value` at zero-based `index`, backfilling unset lower slots with `null`. */
  set(index: number, value: FieldValue): void {
    if (!Number.isInteger(index) || index < 0) {
      throw new RangeError(`FieldList: index must be a non-negative integer, got ${String(index)}`);
    }
    while (this.items.length < index) {
      this.items.push(null);
    }
    this.items[index] = value;
  }

  get(index: number): FieldValue | undefined {
    return this.items[index];
  }

  /** Copy the slots into a plain array. */
  toArray(): FieldValue[] {
    return [...this.items];
  }
}
