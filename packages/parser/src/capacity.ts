/**
 * Capacity clamp for pre-sized result arrays.
 *
 * Counts that drive pre-allocation often come straight from the input (a
 * length-prefix field, say) and cannot be trusted. The initial reservation
 * is clamped; the number of elements actually read is not.
 */

/** Default ceiling, in bytes, on a speculative reservation. */
export const MAX_INITIAL_CAPACITY_BYTES = 65536;

/**
 * JavaScript does not expose element sizes. Arrays hold one reference per
 * slot, so that is the default unit.
 */
export const DEFAULT_ELEMENT_SIZE = 8;

/** Per-call overrides for the clamp. Unset fields fall back to configuration. */
export interface CapacityOptions {
  /** Assumed size in bytes of one collected element. */
  elementSize?: number;
  /** Ceiling in bytes on the initial reservation. */
  maxInitialCapacityBytes?: number;
}

/** `min(requested, floor(maxBytes / max(1, elementSize)))`, never negative. */
export function initialCapacity(requested: number, elementSize: number, maxBytes: number): number {
  return Math.max(0, Math.min(requested, Math.floor(maxBytes / Math.max(1, elementSize))));
}

/**
 * A pre-sized array with a fill pointer. Writes past the reservation grow the
 * array as usual.
 */
export class Reservation<T> {
  private readonly items: T[];
  private filled = 0;

  constructor(capacity: number) {
    this.items = new Array<T>(capacity);
  }

  get length(): number {
    return this.filled;
  }

  push(item: T): void {
    this.items[this.filled++] = item;
  }

  /** Trim unused slots and hand over the array. */
  finish(): T[] {
    this.items.length = this.filled;
    return this.items;
  }
}
