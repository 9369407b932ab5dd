/**
 * Primitive parsers for partial input.
 *
 * Same matching rules as `primitives.ts`, but when the input ends before a
 * decision can be made they report `incomplete` with the number of units
 * still missing.
 */

import type { SliceableInput } from "./input.js";
import { bytesTag, stringTag, takeN, uint } from "./primitives.js";
import type { Parser } from "./types.js";

/** Match an exact string or byte sequence; a true prefix of it is `incomplete`. */
export function tag(t: string): Parser<string, string>;
export function tag(t: Uint8Array): Parser<Uint8Array, Uint8Array>;
export function tag(t: string | Uint8Array): Parser<string, string> | Parser<Uint8Array, Uint8Array> {
  return typeof t === "string" ? stringTag(t, true) : bytesTag(t, true);
}

/** Take exactly `n` units, or report how many are missing. */
export function take<I extends SliceableInput<I>>(n: number): Parser<I, I> {
  return takeN<I>(n, true);
}

export function beU8(): Parser<Uint8Array, number> {
  return uint(1, false, true);
}

export function beU16(): Parser<Uint8Array, number> {
  return uint(2, false, true);
}

export function beU32(): Parser<Uint8Array, number> {
  return uint(4, false, true);
}
