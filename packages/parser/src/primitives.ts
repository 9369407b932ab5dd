/**
 * Primitive parsers for complete input.
 *
 * These are the leaves the combinators are built over: literal tags,
 * character classes, fixed-size takes and fixed-width integers. Running out
 * of input is an ordinary `error`; see `streaming.ts` for variants that
 * report `incomplete` instead.
 */

import type { Input, SliceableInput } from "./input.js";
import { takeSplit } from "./input.js";
import { errorAt, incomplete, mkParser, ok } from "./parser.js";
import type { ErrorKind, Parser } from "./types.js";

// ---------------------------------------------------------------------------
// Internal builders, shared with the streaming variants
// ---------------------------------------------------------------------------

export function stringTag(t: string, partial: boolean): Parser<string, string> {
  return mkParser<string, string>((input) => {
    if (input.startsWith(t)) return ok(input.slice(t.length), t);
    if (partial && input.length < t.length && t.startsWith(input)) {
      return incomplete({ type: "size", size: t.length - input.length });
    }
    return errorAt(input, "Tag", JSON.stringify(t));
  });
}

export function bytesTag(t: Uint8Array, partial: boolean): Parser<Uint8Array, Uint8Array> {
  return mkParser<Uint8Array, Uint8Array>((input) => {
    const common = Math.min(input.length, t.length);
    for (let i = 0; i < common; i++) {
      if (input[i] !== t[i]) return errorAt(input, "Tag", hex(t));
    }
    if (input.length >= t.length) return ok(input.subarray(t.length), input.subarray(0, t.length));
    if (partial) return incomplete({ type: "size", size: t.length - input.length });
    return errorAt(input, "Tag", hex(t));
  });
}

export function takeN<I extends SliceableInput<I>>(n: number, partial: boolean): Parser<I, I> {
  return mkParser<I, I>((input) => {
    if (input.length < n) {
      if (partial) return incomplete({ type: "size", size: n - input.length });
      return errorAt(input, "Eof", `${n} units`);
    }
    const [rest, taken] = takeSplit(input, n);
    return ok(rest, taken);
  });
}

export function uint(size: 1 | 2 | 4, littleEndian: boolean, partial: boolean): Parser<Uint8Array, number> {
  return mkParser<Uint8Array, number>((input) => {
    if (input.length < size) {
      if (partial) return incomplete({ type: "size", size: size - input.length });
      return errorAt(input, "Eof", `${size} bytes`);
    }
    const view = new DataView(input.buffer, input.byteOffset, size);
    const value =
      size === 1 ? view.getUint8(0) : size === 2 ? view.getUint16(0, littleEndian) : view.getUint32(0, littleEndian);
    return ok(input.subarray(size), value);
  });
}

function hex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join(" ");
}

/** Longest prefix of characters satisfying `pred`, requiring at least `min`. */
function takeWhile(pred: (ch: string) => boolean, min: 0 | 1, kind: ErrorKind): Parser<string, string> {
  return mkParser<string, string>((input) => {
    let end = 0;
    while (end < input.length && pred(input[end])) end++;
    if (end < min) return errorAt(input, kind);
    return ok(input.slice(end), input.slice(0, end));
  });
}

const isDigit = (ch: string): boolean => ch >= "0" && ch <= "9";
const isAlpha = (ch: string): boolean => (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z");
const isSpace = (ch: string): boolean => ch === " " || ch === "\t" || ch === "\r" || ch === "\n";

// ---------------------------------------------------------------------------
// Literals
// ---------------------------------------------------------------------------

/** Match an exact string or byte sequence. */
export function tag(t: string): Parser<string, string>;
export function tag(t: Uint8Array): Parser<Uint8Array, Uint8Array>;
export function tag(t: string | Uint8Array): Parser<string, string> | Parser<Uint8Array, Uint8Array> {
  return typeof t === "string" ? stringTag(t, false) : bytesTag(t, false);
}

/** Match a single specific character. */
export function char(c: string): Parser<string, string> {
  return mkParser<string, string>((input) => {
    if (input.length > 0 && input[0] === c) return ok(input.slice(1), c);
    return errorAt(input, "Char", JSON.stringify(c));
  });
}

/** Take exactly `n` units. */
export function take<I extends SliceableInput<I>>(n: number): Parser<I, I> {
  return takeN<I>(n, false);
}

/** Match end of input, consuming nothing. */
export function eof<I extends Input>(): Parser<I, null> {
  return mkParser<I, null>((input) => {
    if (input.length === 0) return ok(input, null);
    return errorAt(input, "Eof", "end of input");
  });
}

// ---------------------------------------------------------------------------
// Character classes
// ---------------------------------------------------------------------------

/** Zero or more ASCII digits. Can succeed without consuming input. */
export function digit0(): Parser<string, string> {
  return takeWhile(isDigit, 0, "Digit");
}

/** One or more ASCII digits. */
export function digit1(): Parser<string, string> {
  return takeWhile(isDigit, 1, "Digit");
}

/** Zero or more ASCII letters. Can succeed without consuming input. */
export function alpha0(): Parser<string, string> {
  return takeWhile(isAlpha, 0, "Alpha");
}

/** One or more ASCII letters. */
export function alpha1(): Parser<string, string> {
  return takeWhile(isAlpha, 1, "Alpha");
}

/** Zero or more spaces, tabs, carriage returns or newlines. */
export function space0(): Parser<string, string> {
  return takeWhile(isSpace, 0, "Space");
}

/** One or more spaces, tabs, carriage returns or newlines. */
export function space1(): Parser<string, string> {
  return takeWhile(isSpace, 1, "Space");
}

// ---------------------------------------------------------------------------
// Fixed-width unsigned integers
// ---------------------------------------------------------------------------

export function beU8(): Parser<Uint8Array, number> {
  return uint(1, false, false);
}

/** Big-endian unsigned 16-bit integer. */
export function beU16(): Parser<Uint8Array, number> {
  return uint(2, false, false);
}

/** Big-endian unsigned 32-bit integer. */
export function beU32(): Parser<Uint8Array, number> {
  return uint(4, false, false);
}

/** Little-endian unsigned 16-bit integer. */
export function leU16(): Parser<Uint8Array, number> {
  return uint(2, true, false);
}

/** Little-endian unsigned 32-bit integer. */
export function leU32(): Parser<Uint8Array, number> {
  return uint(4, true, false);
}
