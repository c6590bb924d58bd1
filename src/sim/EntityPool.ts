/**
 * Fixed-capacity, column-oriented entity pool.
 *
 * Slots [0, count) are live and contiguous. Subclasses own one typed array
 * per attribute and implement moveSlot() so remove() can overwrite the
 * removed slot with the last live one. Removal reorders entities; callers
 * iterating forward must revisit index i after removing it.
 */
export abstract class EntityPool {
  readonly capacity: number;
  protected n = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`pool capacity must be a non-negative integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get count(): number {
    return this.n;
  }

  get full(): boolean {
    return this.n >= this.capacity;
  }

  clear(): void {
    this.n = 0;
  }

  /** Swap-remove slot i. Indices outside [0, count) are ignored. */
  remove(i: number): void {
    if (!(i >= 0 && i < this.n) || !Number.isInteger(i)) return;
    const last = --this.n;
    if (i !== last) this.moveSlot(last, i);
  }

  /** Claim the next free slot, or -1 when full. */
  protected claim(): number {
    if (this.n >= this.capacity) return -1;
    return this.n++;
  }

  protected abstract moveSlot(from: number, to: number): void;
}
