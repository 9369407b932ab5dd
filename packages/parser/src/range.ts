/**
 * Repetition ranges for the range-generic `many` and `fold` combinators.
 *
 * One capability covers "exactly N", "at least N", "between N and M" and
 * "unbounded" so callers need a single combinator for all of them.
 */

import { checkCount } from "./internal.js";

/** Largest iteration count an unbounded range counts up to. */
const COUNT_LIMIT = Number.MAX_SAFE_INTEGER;

export interface RepeatRange {
  /** `true` if no count can satisfy the range. */
  isInverted(): boolean;
  /** `true` if `count` repetitions satisfy the range. */
  contains(count: number): boolean;
  /**
   * Iteration indices from 0 up to the upper bound. An unbounded range stops
   * at `Number.MAX_SAFE_INTEGER`.
   */
  boundedIter(): Iterable<number>;
  /**
   * Like `boundedIter`, but an unbounded range never ends: once the index
   * reaches `Number.MAX_SAFE_INTEGER` it repeats that value.
   */
  saturatingIter(): Iterable<number>;
  /** Short display form for diagnostics, such as `1..=3` or `2..`. */
  describe?(): string;
}

/** Display form of any range; custom ranges without `describe` fall back to a fixed label. */
export function describeRange(range: RepeatRange): string {
  return range.describe?.() ?? "custom range";
}

/** A range, or a plain count meaning "exactly this many". */
export type RangeLike = RepeatRange | number;

class Bounds implements RepeatRange {
  /**
   * @param min - inclusive lower bound
   * @param max - inclusive upper bound, `Infinity` when unbounded; may be
   *   below `min` for ranges that are empty without being inverted (`fewerThan(0)`)
   * @param inverted - set by constructors whose arguments are out of order
   */
  constructor(
    private readonly min: number,
    private readonly max: number,
    private readonly inverted: boolean,
  ) {}

  isInverted(): boolean {
    return this.inverted;
  }

  contains(count: number): boolean {
    return count >= this.min && count <= this.max;
  }

  *boundedIter(): Generator<number> {
    const end = Math.min(this.max, COUNT_LIMIT);
    for (let i = 0; i < end; i++) yield i;
  }

  *saturatingIter(): Generator<number> {
    if (this.max !== Infinity) {
      yield* this.boundedIter();
      return;
    }
    let i = 0;
    for (;;) {
      yield i;
      if (i < COUNT_LIMIT) i++;
    }
  }

  describe(): string {
    if (this.max === Infinity) return `${this.min}..`;
    // fewerThan(0): empty without being inverted
    if (!this.inverted && this.max < this.min) return `..<0`;
    if (this.min === this.max) return `${this.min}`;
    return `${this.min}..=${this.max}`;
  }

  toString(): string {
    return this.describe();
  }
}

/** Exactly `n` repetitions. */
export function exactly(n: number): RepeatRange {
  checkCount(n, "count");
  return new Bounds(n, n, false);
}

/** `min` to `max` repetitions, both inclusive. Inverted when `min > max`. */
export function between(min: number, max: number): RepeatRange {
  checkCount(min, "min");
  checkCount(max, "max");
  return new Bounds(min, max, min > max);
}

/** `start` up to but excluding `end` repetitions. Inverted unless `start < end`. */
export function range(start: number, end: number): RepeatRange {
  checkCount(start, "start");
  checkCount(end, "end");
  return new Bounds(start, end - 1, !(start < end));
}

/** `min` or more repetitions. */
export function atLeast(min: number): RepeatRange {
  checkCount(min, "min");
  return new Bounds(min, Infinity, false);
}

/** Up to `max` repetitions, inclusive. */
export function atMost(max: number): RepeatRange {
  checkCount(max, "max");
  return new Bounds(0, max, false);
}

/** Fewer than `end` repetitions. `fewerThan(0)` matches nothing but is not inverted. */
export function fewerThan(end: number): RepeatRange {
  checkCount(end, "end");
  return new Bounds(0, end - 1, false);
}

/** Any number of repetitions. */
export function unbounded(): RepeatRange {
  return new Bounds(0, Infinity, false);
}

export function toRange(value: RangeLike): RepeatRange {
  return typeof value === "number" ? exactly(value) : value;
}
