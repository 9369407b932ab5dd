/**
 * Error payloads and reporting.
 *
 * `ParseError` is the payload carried by `error` and `failure` signals. It is
 * plain data: combinators create many of them while backtracking, so it does
 * not extend `Error`. `ParseException` is the thrown form, produced only by
 * `Parser.parseAll`.
 */

import type { Err, ErrorKind } from "./types.js";
import type { Input } from "./input.js";

/** One annotation added by an enclosing combinator. */
export interface ErrorFrame<I> {
  readonly input: I;
  readonly kind: ErrorKind;
}

export class ParseError<I> {
  /** Input remaining where the innermost error was raised. */
  readonly input: I;
  /** Tag of the innermost condition. */
  readonly kind: ErrorKind;
  /** What the primitive was looking for, when it can say. */
  readonly expected: string | undefined;
  /** Enclosing combinators that annotated this error, innermost first. */
  readonly context: readonly ErrorFrame<I>[];

  constructor(
    input: I,
    kind: ErrorKind,
    expected?: string,
    context: readonly ErrorFrame<I>[] = [],
  ) {
    this.input = input;
    this.kind = kind;
    this.expected = expected;
    this.context = context;
  }

  static fromKind<I>(input: I, kind: ErrorKind, expected?: string): ParseError<I> {
    return new ParseError(input, kind, expected);
  }

  /** Return a copy of this error with one more enclosing frame. */
  append(input: I, kind: ErrorKind): ParseError<I> {
    return new ParseError(this.input, this.kind, this.expected, [...this.context, { input, kind }]);
  }

  /** Kinds from innermost to outermost. */
  kinds(): ErrorKind[] {
    return [this.kind, ...this.context.map((frame) => frame.kind)];
  }
}

/** Render a signal as a one-line diagnostic without positions. */
export function describeError<I>(err: Err<I>): string {
  if (err.type === "incomplete") {
    return err.needed.type === "size"
      ? `incomplete input: ${err.needed.size} more needed`
      : "incomplete input";
  }
  const { error } = err;
  let message = `${err.type}: ${error.kind}`;
  if (error.expected !== undefined) message += ` (expected ${error.expected})`;
  if (error.context.length > 0) {
    message += ` in ${error.context.map((frame) => frame.kind).join(" < ")}`;
  }
  return message;
}

/** Thrown by `parseAll` when parsing stops short of a value for the whole input. */
export class ParseException<I extends Input> extends Error {
  /** The signal that stopped parsing, or `undefined` if input was left over. */
  readonly signal: Err<I> | undefined;
  /** Zero-based offset into the original input. */
  readonly offset: number;
  /** 1-based line, for string input. */
  readonly line: number | undefined;
  /** 1-based column, for string input. */
  readonly col: number | undefined;

  constructor(original: I, remaining: I, signal?: Err<I>) {
    const offset = original.length - remaining.length;
    const reason = signal ? describeError(signal) : "expected end of input";
    let message: string;
    let line: number | undefined;
    let col: number | undefined;
    if (typeof original === "string") {
      ({ line, col } = lineCol(original, offset));
      const snippet = original.slice(Math.max(0, offset - 10), offset + 20);
      message = `Parse error at line ${line}, col ${col}: ${reason}\n  ...${snippet}...`;
    } else {
      message = `Parse error at offset ${offset}: ${reason}`;
    }
    super(message);
    this.name = "ParseException";
    this.signal = signal;
    this.offset = offset;
    this.line = line;
    this.col = col;
  }
}

/** Convert a zero-based offset to 1-based line/col. */
function lineCol(input: string, pos: number): { line: number; col: number } {
  let line = 1;
  let col = 1;
  for (let i = 0; i < pos && i < input.length; i++) {
    if (input[i] === "\n") {
      line++;
      col = 1;
    } else {
      col++;
    }
  }
  return { line, col };
}
