/**
 * Parser construction helpers shared by every combinator.
 */

import { ParseError, ParseException } from "./error.js";
import type { Input } from "./input.js";
import type { Err, ErrorKind, Needed, ParseResult, Parser } from "./types.js";

/** Create a Parser from a raw parse function. */
export function mkParser<I extends Input, O>(parseFn: (input: I) => ParseResult<I, O>): Parser<I, O> {
  return {
    parse(input: I): ParseResult<I, O> {
      return parseFn(input);
    },
    parseAll(input: I): O {
      const result = parseFn(input);
      if (!result.ok) {
        throw new ParseException(input, remainderOf(input, result.err), result.err);
      }
      if (result.rest.length !== 0) {
        throw new ParseException(input, result.rest);
      }
      return result.value;
    },
  };
}

function remainderOf<I>(input: I, err: Err<I>): I {
  return err.type === "incomplete" ? input : err.error.input;
}

export function ok<I, O>(rest: I, value: O): ParseResult<I, O> {
  return { ok: true, rest, value };
}

/** Recoverable error signal. */
export function error<I, O>(err: ParseError<I>): ParseResult<I, O> {
  return { ok: false, err: { type: "error", error: err } };
}

/** Unrecoverable failure signal. */
export function failure<I, O>(err: ParseError<I>): ParseResult<I, O> {
  return { ok: false, err: { type: "failure", error: err } };
}

export function incomplete<I, O>(needed: Needed): ParseResult<I, O> {
  return { ok: false, err: { type: "incomplete", needed } };
}

/** Shorthand for a fresh recoverable error of `kind` at `input`. */
export function errorAt<I, O>(input: I, kind: ErrorKind, expected?: string): ParseResult<I, O> {
  return error(ParseError.fromKind(input, kind, expected));
}

/** Shorthand for a fresh failure of `kind` at `input`. */
export function failureAt<I, O>(input: I, kind: ErrorKind): ParseResult<I, O> {
  return failure(ParseError.fromKind(input, kind));
}

/** Re-type a failed result for a parser with a different output. */
export function forward<I, O>(err: Err<I>): ParseResult<I, O> {
  return { ok: false, err };
}
