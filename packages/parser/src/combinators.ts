/**
 * Sequencing, choice and signal-shaping combinators.
 *
 * PEG semantics: ordered alternation, first match wins. Only a recoverable
 * `error` lets `alt`, `opt` and `not` move on; `failure` and `incomplete`
 * always pass through.
 */

import type { Input } from "./input.js";
import { error, errorAt, failure, forward, mkParser, ok } from "./parser.js";
import type { Parser } from "./types.js";

// ---------------------------------------------------------------------------
// Transformation
// ---------------------------------------------------------------------------

/** Transform a parser's result with a function. */
export function map<I extends Input, A, B>(p: Parser<I, A>, f: (a: A) => B): Parser<I, B> {
  return mkParser<I, B>((input) => {
    const r = p.parse(input);
    if (!r.ok) return forward(r.err);
    return ok(r.rest, f(r.value));
  });
}

/** Succeed only if `pred` accepts the value; otherwise an error tagged `Verify`. */
export function verify<I extends Input, A>(p: Parser<I, A>, pred: (a: A) => boolean): Parser<I, A> {
  return mkParser<I, A>((input) => {
    const r = p.parse(input);
    if (!r.ok) return r;
    return pred(r.value) ? r : errorAt(input, "Verify");
  });
}

// ---------------------------------------------------------------------------
// Sequence combinators
// ---------------------------------------------------------------------------

/** Sequence two parsers. */
export function pair<I extends Input, A, B>(a: Parser<I, A>, b: Parser<I, B>): Parser<I, [A, B]> {
  return mkParser<I, [A, B]>((input) => {
    const ra = a.parse(input);
    if (!ra.ok) return forward(ra.err);
    const rb = b.parse(ra.rest);
    if (!rb.ok) return forward(rb.err);
    return ok(rb.rest, [ra.value, rb.value]);
  });
}

/** Run `first` then `p`, keeping only `p`'s value. */
export function preceded<I extends Input, A, B>(first: Parser<I, A>, p: Parser<I, B>): Parser<I, B> {
  return map(pair(first, p), ([, b]) => b);
}

/** Run `p` then `last`, keeping only `p`'s value. */
export function terminated<I extends Input, A, B>(p: Parser<I, A>, last: Parser<I, B>): Parser<I, A> {
  return map(pair(p, last), ([a]) => a);
}

// ---------------------------------------------------------------------------
// Alternation
// ---------------------------------------------------------------------------

/** Ordered alternation: try `a` first, then `b` if `a` errors. */
export function alt<I extends Input, A, B>(a: Parser<I, A>, b: Parser<I, B>): Parser<I, A | B> {
  return mkParser<I, A | B>((input) => {
    const ra = a.parse(input);
    if (ra.ok) return ra;
    if (ra.err.type !== "error") return forward(ra.err);
    const rb = b.parse(input);
    if (rb.ok) return rb;
    if (rb.err.type !== "error") return forward(rb.err);
    return error(rb.err.error.append(input, "Alt"));
  });
}

/** Optional: succeed with `null` if `p` errors, consuming nothing. */
export function opt<I extends Input, A>(p: Parser<I, A>): Parser<I, A | null> {
  return mkParser<I, A | null>((input) => {
    const r = p.parse(input);
    if (r.ok) return r;
    if (r.err.type === "error") return ok(input, null);
    return forward(r.err);
  });
}

/** Negative lookahead: succeed with null only if `p` errors here. Never consumes input. */
export function not<I extends Input, A>(p: Parser<I, A>): Parser<I, null> {
  return mkParser<I, null>((input) => {
    const r = p.parse(input);
    if (r.ok) return errorAt(input, "Not");
    if (r.err.type === "error") return ok(input, null);
    return forward(r.err);
  });
}

// ---------------------------------------------------------------------------
// Signal shaping
// ---------------------------------------------------------------------------

/** Commit: turn a recoverable `error` from `p` into a `failure`. */
export function cut<I extends Input, A>(p: Parser<I, A>): Parser<I, A> {
  return mkParser<I, A>((input) => {
    const r = p.parse(input);
    if (!r.ok && r.err.type === "error") return failure(r.err.error);
    return r;
  });
}

/** Treat `incomplete` from `p` as an ordinary error tagged `Complete`. */
export function complete<I extends Input, A>(p: Parser<I, A>): Parser<I, A> {
  return mkParser<I, A>((input) => {
    const r = p.parse(input);
    if (!r.ok && r.err.type === "incomplete") return errorAt(input, "Complete");
    return r;
  });
}

/** Lazy parser for recursive grammars. `f` is called on first use. */
export function lazy<I extends Input, A>(f: () => Parser<I, A>): Parser<I, A> {
  let cached: Parser<I, A> | null = null;
  return mkParser<I, A>((input) => {
    if (!cached) cached = f();
    return cached.parse(input);
  });
}
