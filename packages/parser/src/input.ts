/**
 * Input capabilities.
 *
 * Combinators only ever look at how much input is left and, for the
 * length-prefixed family, split it. Strings and `Uint8Array` satisfy both
 * capabilities structurally; custom input types implement them.
 */

/** Anything a parser can consume. `length` counts the units left. */
export interface Input {
  readonly length: number;
}

/** Input that can be cut at an index without copying semantics leaking out. */
export interface SliceableInput<Self> extends Input {
  slice(start: number, end?: number): Self;
}

/**
 * Split `input` after `count` units, returning `[rest, taken]`.
 *
 * `count` must not exceed `input.length`; callers check first.
 */
export function takeSplit<I extends SliceableInput<I>>(input: I, count: number): [rest: I, taken: I] {
  return [input.slice(count), input.slice(0, count)];
}

/** Numeric outputs accepted from a "read a length" parser. */
export type SizeLike = number | bigint;

/**
 * Convert a length or count field to a size.
 * Returns `undefined` when the value is negative, fractional or not a safe integer.
 */
export function toUsize(value: SizeLike): number | undefined {
  if (typeof value === "bigint") {
    if (value < 0n || value > BigInt(Number.MAX_SAFE_INTEGER)) return undefined;
    return Number(value);
  }
  return Number.isSafeInteger(value) && value >= 0 ? value : undefined;
}
