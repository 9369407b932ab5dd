/**
 * Combinators applying their child parser multiple times.
 *
 * All of them share one loop shape: apply the child to the current remainder,
 * accept a result only if it consumed something, stop quietly on a
 * recoverable `error`, and pass `failure` / `incomplete` straight through.
 */

import type { CapacityOptions } from "./capacity.js";
import type { Input } from "./input.js";
import { checkCount, reserve, zeroProgress } from "./internal.js";
import { debugLog } from "./log.js";
import { error, errorAt, failureAt, forward, mkParser, ok } from "./parser.js";
import { describeRange, toRange, type RangeLike } from "./range.js";
import type { ParseResult, Parser } from "./types.js";

// ---------------------------------------------------------------------------
// Unbounded repetition
// ---------------------------------------------------------------------------

/**
 * Zero or more repetitions of `f`, collected in order.
 *
 * Stops on a recoverable error and returns what was collected, with the input
 * as it was before the failing attempt. A child that succeeds without
 * consuming input is reported as an `error` tagged `Many0`.
 *
 * @example
 * ```ts
 * many0(tag("abc")).parse("abcabc123"); // rest "123", value ["abc", "abc"]
 * ```
 */
export function many0<I extends Input, O>(f: Parser<I, O>): Parser<I, O[]> {
  return mkParser<I, O[]>((input) => {
    const results: O[] = [];
    let cur = input;
    for (;;) {
      const len = cur.length;
      const r = f.parse(cur);
      if (!r.ok) {
        if (r.err.type === "error") return ok(cur, results);
        return forward(r.err);
      }
      if (r.rest.length === len) return zeroProgress(cur, "Many0");
      results.push(r.value);
      cur = r.rest;
    }
  });
}

/**
 * One or more repetitions of `f`.
 *
 * A recoverable error on the first attempt is annotated with `Many1` and
 * returned; later ones end the repetition like `many0`.
 */
export function many1<I extends Input, O>(f: Parser<I, O>): Parser<I, O[]> {
  return mkParser<I, O[]>((input) => {
    const first = f.parse(input);
    if (!first.ok) {
      if (first.err.type === "error") return error(first.err.error.append(input, "Many1"));
      return forward(first.err);
    }
    const results: O[] = [first.value];
    let cur = first.rest;
    for (;;) {
      const len = cur.length;
      const r = f.parse(cur);
      if (!r.ok) {
        if (r.err.type === "error") return ok(cur, results);
        return forward(r.err);
      }
      if (r.rest.length === len) return zeroProgress(cur, "Many1");
      results.push(r.value);
      cur = r.rest;
    }
  });
}

/** Count repetitions of `f` without collecting them. Zero or more. */
export function many0Count<I extends Input, O>(f: Parser<I, O>): Parser<I, number> {
  return mkParser<I, number>((input) => {
    let count = 0;
    let cur = input;
    for (;;) {
      const len = cur.length;
      const r = f.parse(cur);
      if (!r.ok) {
        if (r.err.type === "error") return ok(cur, count);
        return forward(r.err);
      }
      if (r.rest.length === len) return zeroProgress(cur, "Many0Count");
      count++;
      cur = r.rest;
    }
  });
}

/**
 * Count repetitions of `f`, requiring at least one. A first-attempt error is
 * replaced by a fresh `Many1Count` error.
 */
export function many1Count<I extends Input, O>(f: Parser<I, O>): Parser<I, number> {
  return mkParser<I, number>((input) => {
    const first = f.parse(input);
    if (!first.ok) {
      if (first.err.type === "error") return errorAt(input, "Many1Count");
      return forward(first.err);
    }
    let count = 1;
    let cur = first.rest;
    for (;;) {
      const len = cur.length;
      const r = f.parse(cur);
      if (!r.ok) {
        if (r.err.type === "error") return ok(cur, count);
        return forward(r.err);
      }
      if (r.rest.length === len) return zeroProgress(r.rest, "Many1Count");
      count++;
      cur = r.rest;
    }
  });
}

// ---------------------------------------------------------------------------
// Bounded repetition
// ---------------------------------------------------------------------------

/**
 * Between `min` and `max` repetitions of `f` (both inclusive).
 *
 * `min > max` is a configuration mistake and yields a `failure` without
 * running `f`. Reaching `max` stops without consulting `f` again. The result
 * array is pre-sized for `min` elements, subject to the capacity clamp.
 */
export function manyMN<I extends Input, O>(
  min: number,
  max: number,
  f: Parser<I, O>,
  options?: CapacityOptions,
): Parser<I, O[]> {
  checkCount(min, "min");
  if (max !== Infinity) checkCount(max, "max");
  return mkParser<I, O[]>((input) => {
    if (min > max) {
      debugLog("ManyMN", `min ${min} exceeds max ${max}`);
      return failureAt(input, "ManyMN");
    }
    const results = reserve<O>(min, "ManyMN", options);
    let cur = input;
    for (let n = 0; n < max; n++) {
      const len = cur.length;
      const r = f.parse(cur);
      if (!r.ok) {
        if (r.err.type !== "error") return forward(r.err);
        if (n < min) return error(r.err.error.append(cur, "ManyMN"));
        return ok(cur, results.finish());
      }
      if (r.rest.length === len) return zeroProgress(cur, "ManyMN");
      results.push(r.value);
      cur = r.rest;
    }
    return ok(cur, results.finish());
  });
}

/**
 * Range-generic repetition: `many(3, p)`, `many(between(1, 4), p)`,
 * `many(atLeast(2), p)`, `many(unbounded(), p)`.
 *
 * An inverted range yields a `failure` tagged `Many`. A recoverable error
 * while the collected count is outside the range is annotated and returned.
 */
export function many<I extends Input, O>(range: RangeLike, f: Parser<I, O>): Parser<I, O[]> {
  const bounds = toRange(range);
  return mkParser<I, O[]>((input) => {
    if (bounds.isInverted()) {
      debugLog("Many", `inverted range ${describeRange(bounds)}`);
      return failureAt(input, "Many");
    }
    const results: O[] = [];
    let cur = input;
    for (const n of bounds.boundedIter()) {
      const len = cur.length;
      const r = f.parse(cur);
      if (!r.ok) {
        if (r.err.type !== "error") return forward(r.err);
        if (!bounds.contains(n)) return error(r.err.error.append(cur, "Many"));
        return ok(cur, results);
      }
      if (r.rest.length === len) return zeroProgress(cur, "Many");
      results.push(r.value);
      cur = r.rest;
    }
    return ok(cur, results);
  });
}

// ---------------------------------------------------------------------------
// Termination and separation
// ---------------------------------------------------------------------------

/**
 * Apply `f` until `g` matches, returning the collected `f` results and `g`'s
 * output. `g` is tried first on every round.
 *
 * If neither matches, the error from `f` is annotated with `ManyTill`.
 */
export function manyTill<I extends Input, O, P>(f: Parser<I, O>, g: Parser<I, P>): Parser<I, [O[], P]> {
  return mkParser<I, [O[], P]>((input) => {
    const results: O[] = [];
    let cur = input;
    for (;;) {
      const len = cur.length;
      const end = g.parse(cur);
      if (end.ok) return ok(end.rest, [results, end.value]);
      if (end.err.type !== "error") return forward(end.err);

      const r = f.parse(cur);
      if (!r.ok) {
        if (r.err.type === "error") return error(r.err.error.append(cur, "ManyTill"));
        return forward(r.err);
      }
      if (r.rest.length === len) return zeroProgress(r.rest, "ManyTill");
      results.push(r.value);
      cur = r.rest;
    }
  });
}

/**
 * Shared loop for the separated lists, entered after the first element.
 * A separator followed by a failing element is not consumed.
 */
function separatedTail<I extends Input, O, S>(
  sep: Parser<I, S>,
  f: Parser<I, O>,
  results: O[],
  start: I,
): ParseResult<I, O[]> {
  let cur = start;
  for (;;) {
    const len = cur.length;
    const rs = sep.parse(cur);
    if (!rs.ok) {
      if (rs.err.type === "error") return ok(cur, results);
      return forward(rs.err);
    }
    if (rs.rest.length === len) return zeroProgress(rs.rest, "SeparatedList");

    const ri = f.parse(rs.rest);
    if (!ri.ok) {
      if (ri.err.type === "error") return ok(cur, results);
      return forward(ri.err);
    }
    results.push(ri.value);
    cur = ri.rest;
  }
}

/**
 * Zero or more `f` separated by `sep`.
 *
 * @example
 * ```ts
 * separatedList0(tag("|"), tag("abc")).parse("abc|abc|def"); // rest "|def", value ["abc", "abc"]
 * ```
 */
export function separatedList0<I extends Input, O, S>(sep: Parser<I, S>, f: Parser<I, O>): Parser<I, O[]> {
  return mkParser<I, O[]>((input) => {
    const first = f.parse(input);
    if (!first.ok) {
      if (first.err.type === "error") return ok(input, []);
      return forward(first.err);
    }
    return separatedTail(sep, f, [first.value], first.rest);
  });
}

/** One or more `f` separated by `sep`. A failing first element is returned unchanged. */
export function separatedList1<I extends Input, O, S>(sep: Parser<I, S>, f: Parser<I, O>): Parser<I, O[]> {
  return mkParser<I, O[]>((input) => {
    const first = f.parse(input);
    if (!first.ok) return forward(first.err);
    return separatedTail(sep, f, [first.value], first.rest);
  });
}

// ---------------------------------------------------------------------------
// Fixed arity
// ---------------------------------------------------------------------------

/**
 * Exactly `n` repetitions of `f`. Any recoverable error is annotated with
 * `Count` at the input the combinator started on.
 *
 * The result array is pre-sized for `n` elements, subject to the capacity
 * clamp; all `n` elements are still read.
 */
export function count<I extends Input, O>(f: Parser<I, O>, n: number, options?: CapacityOptions): Parser<I, O[]> {
  checkCount(n, "count");
  return mkParser<I, O[]>((input) => {
    const results = reserve<O>(n, "Count", options);
    let cur = input;
    for (let k = 0; k < n; k++) {
      const r = f.parse(cur);
      if (!r.ok) {
        if (r.err.type === "error") return error(r.err.error.append(input, "Count"));
        return forward(r.err);
      }
      results.push(r.value);
      cur = r.rest;
    }
    return ok(cur, results.finish());
  });
}

/**
 * Apply `f` once per slot of `buffer`, overwriting the slots in order. The
 * buffer is the result; the parser's own output is `undefined`.
 *
 * On error, slots already written keep their new values.
 */
export function fill<I extends Input, O>(f: Parser<I, O>, buffer: O[]): Parser<I, undefined> {
  return mkParser<I, undefined>((input) => {
    let cur = input;
    for (let k = 0; k < buffer.length; k++) {
      const r = f.parse(cur);
      if (!r.ok) {
        if (r.err.type === "error") return error(r.err.error.append(input, "Count"));
        return forward(r.err);
      }
      buffer[k] = r.value;
      cur = r.rest;
    }
    return ok(cur, undefined);
  });
}
