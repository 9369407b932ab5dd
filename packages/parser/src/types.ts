/**
 * Core types for @strand/parser
 *
 * Defines the parse result, the three-way failure signal, and the parser
 * interface every combinator consumes and produces.
 */

import type { ParseError } from "./error.js";
import type { Input } from "./input.js";

/** How much more input a streaming primitive wants before it can decide. */
export type Needed = { type: "unknown" } | { type: "size"; size: number };

/**
 * Failure signal.
 *
 * - `error`: recoverable; a sibling alternative may still match.
 * - `failure`: unrecoverable; never retried or downgraded.
 * - `incomplete`: the input was a true prefix of a longer stream.
 */
export type Err<I> =
  | { type: "error"; error: ParseError<I> }
  | { type: "failure"; error: ParseError<I> }
  | { type: "incomplete"; needed: Needed };

/** Result of a parse attempt: the unconsumed remainder and a value, or a signal. */
export type ParseResult<I, O> =
  | { ok: true; rest: I; value: O }
  | { ok: false; err: Err<I> };

/** A parser consumes a prefix of its input and hands back the remainder. */
export interface Parser<I extends Input, O> {
  /** Attempt to parse a prefix of `input`. */
  parse(input: I): ParseResult<I, O>;
  /** Parse the full input, throwing if any signal is raised or input remains. */
  parseAll(input: I): O;
}

/** Error tags, one per combinator or primitive condition. */
export type ErrorKind =
  | "Tag"
  | "Char"
  | "Digit"
  | "Alpha"
  | "Space"
  | "Eof"
  | "Alt"
  | "Not"
  | "Verify"
  | "Many0"
  | "Many1"
  | "ManyMN"
  | "Many0Count"
  | "Many1Count"
  | "ManyTill"
  | "SeparatedList"
  | "Count"
  | "Many"
  | "Fold"
  | "Complete"
  | "InvalidLength";
