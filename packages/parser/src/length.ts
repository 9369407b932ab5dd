/**
 * Length-prefixed combinators: read a length or count with one parser, then
 * use it to carve out or repeat over what follows.
 */

import type { CapacityOptions } from "./capacity.js";
import { takeSplit, toUsize, type Input, type SizeLike, type SliceableInput } from "./input.js";
import { reserve } from "./internal.js";
import { error, errorAt, forward, incomplete, mkParser, ok } from "./parser.js";
import type { ParseResult, Parser } from "./types.js";

/** Read a length with `f` and split that many units off the remainder. */
function carve<I extends SliceableInput<I>>(f: Parser<I, SizeLike>, input: I): ParseResult<I, I> {
  const r = f.parse(input);
  if (!r.ok) return forward(r.err);
  const length = toUsize(r.value);
  if (length === undefined) return errorAt(input, "InvalidLength", "a non-negative integer length");
  if (length > r.rest.length) {
    return incomplete({ type: "size", size: length - r.rest.length });
  }
  const [rest, taken] = takeSplit(r.rest, length);
  return ok(rest, taken);
}

/**
 * Length-prefixed data: `f` reads a length `n`, the next `n` units are the
 * output. Fewer than `n` units left is `incomplete` with the shortfall.
 *
 * @example
 * ```ts
 * const bytes = Uint8Array.of(0x00, 0x03, 0x61, 0x62, 0x63, 0x65, 0x66, 0x67);
 * lengthData(beU16()).parse(bytes); // value "abc" bytes, rest "efg" bytes
 * ```
 */
export function lengthData<I extends SliceableInput<I>>(f: Parser<I, SizeLike>): Parser<I, I> {
  return mkParser<I, I>((input) => carve(f, input));
}

/**
 * Length-prefixed value: carve `n` units as `lengthData` does, then run `g`
 * on that slice alone.
 *
 * The slice is complete by construction, so an `incomplete` from `g` becomes
 * an `error` tagged `Complete`. Whatever `g` leaves of the slice is dropped.
 */
export function lengthValue<I extends SliceableInput<I>, O>(f: Parser<I, SizeLike>, g: Parser<I, O>): Parser<I, O> {
  return mkParser<I, O>((input) => {
    const carved = carve(f, input);
    if (!carved.ok) return forward(carved.err);
    const slice = carved.value;
    const r = g.parse(slice);
    if (r.ok) return ok(carved.rest, r.value);
    if (r.err.type === "incomplete") return errorAt(slice, "Complete");
    return forward(r.err);
  });
}

/**
 * Length-prefixed count: `f` reads a count `n`, then `g` runs exactly `n`
 * times. Every element is mandatory; a recoverable error from `g` is
 * annotated with `Count` at the input just after the count field.
 */
export function lengthCount<I extends Input, O>(
  f: Parser<I, SizeLike>,
  g: Parser<I, O>,
  options?: CapacityOptions,
): Parser<I, O[]> {
  return mkParser<I, O[]>((input) => {
    const rc = f.parse(input);
    if (!rc.ok) return forward(rc.err);
    const n = toUsize(rc.value);
    if (n === undefined) return errorAt(input, "InvalidLength", "a non-negative integer count");

    const start = rc.rest;
    const results = reserve<O>(n, "LengthCount", options);
    let cur = start;
    for (let k = 0; k < n; k++) {
      const r = g.parse(cur);
      if (!r.ok) {
        if (r.err.type === "error") return error(r.err.error.append(start, "Count"));
        return forward(r.err);
      }
      results.push(r.value);
      cur = r.rest;
    }
    return ok(cur, results.finish());
  });
}
