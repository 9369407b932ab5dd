/**
 * Folding counterparts of the repetition combinators.
 *
 * Same control flow as `many0` / `many1` / `manyMN` / `many`, but each output
 * is combined into an accumulator instead of being collected. `init` is
 * called once per invocation, so no state leaks between parses.
 */

import type { Input } from "./input.js";
import { checkCount, zeroProgress } from "./internal.js";
import { debugLog } from "./log.js";
import { error, errorAt, failureAt, forward, mkParser, ok } from "./parser.js";
import { describeRange, toRange, type RangeLike } from "./range.js";
import type { Parser } from "./types.js";

/** Fold zero or more repetitions of `f`. */
export function foldMany0<I extends Input, O, R>(
  f: Parser<I, O>,
  init: () => R,
  combine: (acc: R, value: O) => R,
): Parser<I, R> {
  return mkParser<I, R>((input) => {
    let acc = init();
    let cur = input;
    for (;;) {
      const len = cur.length;
      const r = f.parse(cur);
      if (!r.ok) {
        if (r.err.type === "error") return ok(cur, acc);
        return forward(r.err);
      }
      if (r.rest.length === len) return zeroProgress(cur, "Many0");
      acc = combine(acc, r.value);
      cur = r.rest;
    }
  });
}

/**
 * Fold one or more repetitions of `f`.
 *
 * A first-attempt error is replaced by a fresh `Many1` error. A later
 * iteration that makes no progress is a recoverable `Many1` error, as in
 * `many1`.
 */
export function foldMany1<I extends Input, O, R>(
  f: Parser<I, O>,
  init: () => R,
  combine: (acc: R, value: O) => R,
): Parser<I, R> {
  return mkParser<I, R>((input) => {
    const seed = init();
    const first = f.parse(input);
    if (!first.ok) {
      if (first.err.type === "error") return errorAt(input, "Many1");
      return forward(first.err);
    }
    let acc = combine(seed, first.value);
    let cur = first.rest;
    for (;;) {
      const len = cur.length;
      const r = f.parse(cur);
      if (!r.ok) {
        if (r.err.type === "error") return ok(cur, acc);
        return forward(r.err);
      }
      if (r.rest.length === len) return zeroProgress(r.rest, "Many1");
      acc = combine(acc, r.value);
      cur = r.rest;
    }
  });
}

/** Fold between `min` and `max` repetitions of `f` (both inclusive). */
export function foldManyMN<I extends Input, O, R>(
  min: number,
  max: number,
  f: Parser<I, O>,
  init: () => R,
  combine: (acc: R, value: O) => R,
): Parser<I, R> {
  checkCount(min, "min");
  if (max !== Infinity) checkCount(max, "max");
  return mkParser<I, R>((input) => {
    if (min > max) {
      debugLog("ManyMN", `min ${min} exceeds max ${max}`);
      return failureAt(input, "ManyMN");
    }
    let acc = init();
    let cur = input;
    for (let n = 0; n < max; n++) {
      const len = cur.length;
      const r = f.parse(cur);
      if (!r.ok) {
        if (r.err.type !== "error") return forward(r.err);
        if (n < min) return error(r.err.error.append(cur, "ManyMN"));
        break;
      }
      if (r.rest.length === len) return zeroProgress(r.rest, "ManyMN");
      acc = combine(acc, r.value);
      cur = r.rest;
    }
    return ok(cur, acc);
  });
}

/**
 * Range-generic fold. An unbounded range keeps going until `f` stops
 * matching; the iteration index saturates rather than running out.
 */
export function fold<I extends Input, O, R>(
  range: RangeLike,
  f: Parser<I, O>,
  init: () => R,
  combine: (acc: R, value: O) => R,
): Parser<I, R> {
  const bounds = toRange(range);
  return mkParser<I, R>((input) => {
    if (bounds.isInverted()) {
      debugLog("Fold", `inverted range ${describeRange(bounds)}`);
      return failureAt(input, "Fold");
    }
    let acc = init();
    let cur = input;
    for (const n of bounds.saturatingIter()) {
      const len = cur.length;
      const r = f.parse(cur);
      if (!r.ok) {
        if (r.err.type !== "error") return forward(r.err);
        if (!bounds.contains(n)) return error(r.err.error.append(cur, "Fold"));
        break;
      }
      if (r.rest.length === len) return zeroProgress(r.rest, "Fold");
      acc = combine(acc, r.value);
      cur = r.rest;
    }
    return ok(cur, acc);
  });
}
