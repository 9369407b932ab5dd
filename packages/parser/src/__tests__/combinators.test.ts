import { describe, it, expect } from "vitest";
import {
  tag,
  char,
  take,
  eof,
  digit0,
  digit1,
  alpha0,
  alpha1,
  space0,
  space1,
  beU8,
  beU16,
  beU32,
  leU16,
  leU32,
  map,
  verify,
  pair,
  preceded,
  terminated,
  alt,
  opt,
  not,
  cut,
  complete,
  lazy,
  many1,
  streaming,
  ParseException,
  describeError,
} from "../index.js";
import type { Err, Input, ParseResult, Parser } from "../index.js";

function signal<I, O>(r: ParseResult<I, O>): Err<I> {
  if (r.ok) throw new Error("expected a signal");
  return r.err;
}

function thrown(fn: () => unknown): ParseException<Input> {
  try {
    fn();
  } catch (e) {
    if (e instanceof ParseException) return e;
    throw e;
  }
  throw new Error("expected a ParseException");
}

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

describe("tag", () => {
  it("matches a string prefix", () => {
    expect(tag("hello").parse("hello world")).toEqual({ ok: true, rest: " world", value: "hello" });
  });

  it("names the expected literal on mismatch", () => {
    expect(signal(tag("hello").parse("help"))).toMatchObject({
      type: "error",
      error: { kind: "Tag", input: "help", expected: '"hello"' },
    });
  });

  it("matches bytes", () => {
    expect(tag(Uint8Array.of(1, 2)).parse(Uint8Array.of(1, 2, 3))).toEqual({
      ok: true,
      rest: Uint8Array.of(3),
      value: Uint8Array.of(1, 2),
    });
  });

  it("names expected bytes in hex", () => {
    expect(signal(tag(Uint8Array.of(0x61, 0x0a)).parse(Uint8Array.of(0x61)))).toMatchObject({
      type: "error",
      error: { kind: "Tag", expected: "61 0a" },
    });
  });

  it("reports a true prefix as incomplete when streaming", () => {
    expect(signal(streaming.tag("hello").parse("hel"))).toEqual({
      type: "incomplete",
      needed: { type: "size", size: 2 },
    });
    expect(signal(streaming.tag(Uint8Array.of(1, 2, 3)).parse(Uint8Array.of(1)))).toEqual({
      type: "incomplete",
      needed: { type: "size", size: 2 },
    });
  });

  it("still errors on a mismatch when streaming", () => {
    expect(signal(streaming.tag("hello").parse("hex")).type).toBe("error");
  });
});

describe("char / take / eof", () => {
  it("char matches one character", () => {
    expect(char("a").parse("ab")).toEqual({ ok: true, rest: "b", value: "a" });
    expect(signal(char("a").parse("")).type).toBe("error");
  });

  it("take splits off n units", () => {
    expect(take<string>(3).parse("abcd")).toEqual({ ok: true, rest: "d", value: "abc" });
    expect(signal(take<string>(5).parse("abc"))).toMatchObject({
      type: "error",
      error: { kind: "Eof", expected: "5 units" },
    });
  });

  it("streaming take reports the shortfall", () => {
    expect(signal(streaming.take<string>(5).parse("abc"))).toEqual({
      type: "incomplete",
      needed: { type: "size", size: 2 },
    });
  });

  it("eof matches only empty input", () => {
    expect(eof<string>().parse("")).toEqual({ ok: true, rest: "", value: null });
    expect(signal(eof<string>().parse("x"))).toMatchObject({ type: "error", error: { kind: "Eof" } });
  });
});

describe("character classes", () => {
  it("digit0 may match nothing", () => {
    expect(digit0().parse("abc")).toEqual({ ok: true, rest: "abc", value: "" });
    expect(digit0().parse("42x")).toEqual({ ok: true, rest: "x", value: "42" });
  });

  it("digit1 needs at least one digit", () => {
    expect(signal(digit1().parse("abc"))).toMatchObject({ type: "error", error: { kind: "Digit" } });
  });

  it("alpha0 / alpha1", () => {
    expect(alpha0().parse("1")).toEqual({ ok: true, rest: "1", value: "" });
    expect(alpha1().parse("abC1")).toEqual({ ok: true, rest: "1", value: "abC" });
    expect(signal(alpha1().parse("1"))).toMatchObject({ type: "error", error: { kind: "Alpha" } });
  });

  it("space0 / space1", () => {
    expect(space0().parse("x")).toEqual({ ok: true, rest: "x", value: "" });
    expect(space1().parse(" \t\nx")).toEqual({ ok: true, rest: "x", value: " \t\n" });
    expect(signal(space1().parse("x"))).toMatchObject({ type: "error", error: { kind: "Space" } });
  });
});

describe("integers", () => {
  const input = Uint8Array.of(1, 2, 3, 4, 5);

  it("reads big-endian values", () => {
    expect(beU8().parse(input)).toEqual({ ok: true, rest: Uint8Array.of(2, 3, 4, 5), value: 1 });
    expect(beU16().parse(input)).toEqual({ ok: true, rest: Uint8Array.of(3, 4, 5), value: 0x0102 });
    expect(beU32().parse(input)).toEqual({ ok: true, rest: Uint8Array.of(5), value: 0x01020304 });
  });

  it("reads little-endian values", () => {
    expect(leU16().parse(input)).toEqual({ ok: true, rest: Uint8Array.of(3, 4, 5), value: 0x0201 });
    expect(leU32().parse(input)).toEqual({ ok: true, rest: Uint8Array.of(5), value: 0x04030201 });
  });

  it("reads from a view with an offset", () => {
    expect(beU16().parse(input.subarray(3))).toEqual({ ok: true, rest: new Uint8Array(0), value: 0x0405 });
  });

  it("reads values above 2^31 as unsigned", () => {
    expect(beU32().parse(Uint8Array.of(0xff, 0xff, 0xff, 0xfe))).toEqual({
      ok: true,
      rest: new Uint8Array(0),
      value: 4294967294,
    });
  });

  it("errors or reports incomplete when short", () => {
    expect(signal(beU16().parse(Uint8Array.of(1)))).toMatchObject({
      type: "error",
      error: { kind: "Eof", expected: "2 bytes" },
    });
    expect(signal(streaming.beU32().parse(Uint8Array.of(1)))).toEqual({
      type: "incomplete",
      needed: { type: "size", size: 3 },
    });
  });
});

// ---------------------------------------------------------------------------
// Combinators
// ---------------------------------------------------------------------------

describe("sequencing", () => {
  it("map transforms the value", () => {
    expect(map(digit1(), Number).parse("42!")).toEqual({ ok: true, rest: "!", value: 42 });
  });

  it("pair keeps both values", () => {
    expect(pair(alpha1(), digit1()).parse("ab12")).toEqual({ ok: true, rest: "", value: ["ab", "12"] });
  });

  it("preceded and terminated keep one side", () => {
    expect(preceded(char("["), digit1()).parse("[7]")).toEqual({ ok: true, rest: "]", value: "7" });
    expect(terminated(digit1(), char(";")).parse("7;x")).toEqual({ ok: true, rest: "x", value: "7" });
  });

  it("pair forwards the second parser's error", () => {
    expect(signal(pair(alpha1(), digit1()).parse("ab!"))).toMatchObject({
      type: "error",
      error: { kind: "Digit", input: "!" },
    });
  });

  it("verify rejects values the predicate refuses", () => {
    const twoDigits = verify(digit1(), (s) => s.length === 2);
    expect(twoDigits.parse("12x")).toEqual({ ok: true, rest: "x", value: "12" });
    expect(signal(twoDigits.parse("123"))).toMatchObject({ type: "error", error: { kind: "Verify", input: "123" } });
  });
});

describe("choice", () => {
  const ab = alt(tag("a"), tag("b"));

  it("alt takes the first match", () => {
    expect(ab.parse("b!")).toEqual({ ok: true, rest: "!", value: "b" });
  });

  it("alt annotates the last error", () => {
    const err = signal(ab.parse("c"));
    if (err.type !== "error") throw new Error("expected error");
    expect(err.error.kinds()).toEqual(["Tag", "Alt"]);
  });

  it("alt does not backtrack past a failure", () => {
    expect(signal(alt(cut(tag("a")), tag("b")).parse("b")).type).toBe("failure");
  });

  it("opt yields null on error", () => {
    expect(opt(tag("a")).parse("b")).toEqual({ ok: true, rest: "b", value: null });
    expect(opt(tag("a")).parse("ab")).toEqual({ ok: true, rest: "b", value: "a" });
  });

  it("not succeeds only where the parser errors", () => {
    expect(not(tag("a")).parse("b")).toEqual({ ok: true, rest: "b", value: null });
    expect(signal(not(tag("a")).parse("a"))).toMatchObject({ type: "error", error: { kind: "Not", input: "a" } });
  });
});

describe("signal shaping", () => {
  it("cut turns an error into a failure", () => {
    expect(signal(cut(tag("a")).parse("b"))).toMatchObject({ type: "failure", error: { kind: "Tag" } });
  });

  it("complete turns incomplete into a Complete error", () => {
    expect(signal(complete(streaming.tag("abc")).parse("ab"))).toMatchObject({
      type: "error",
      error: { kind: "Complete", input: "ab" },
    });
  });

  it("lazy supports recursive grammars", () => {
    const depth: Parser<string, number> = lazy(() =>
      alt(
        map(preceded(char("("), terminated(depth, char(")"))), (d) => d + 1),
        map(tag("x"), () => 0),
      ),
    );
    expect(depth.parseAll("((x))")).toBe(2);
    expect(depth.parseAll("x")).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Reporting
// ---------------------------------------------------------------------------

describe("describeError", () => {
  it("lists expected value and context", () => {
    expect(describeError(signal(many1(tag("abc")).parse("x")))).toBe('error: Tag (expected "abc") in Many1');
  });

  it("describes incomplete input", () => {
    expect(describeError(signal(streaming.tag("abc").parse("a")))).toBe("incomplete input: 2 more needed");
  });
});

describe("parseAll", () => {
  it("returns the value when all input is consumed", () => {
    expect(tag("hello").parseAll("hello")).toBe("hello");
  });

  it("throws with position and reason on an error", () => {
    const e = thrown(() => tag("hello").parseAll("world"));
    expect(e.message).toBe('Parse error at line 1, col 1: error: Tag (expected "hello")\n  ...world...');
    expect(e.offset).toBe(0);
    expect(e.signal?.type).toBe("error");
  });

  it("throws when input is left over", () => {
    const e = thrown(() => tag("hello").parseAll("hello world"));
    expect(e.signal).toBeUndefined();
    expect(e.offset).toBe(5);
    expect(e.col).toBe(6);
    expect(e.message.startsWith("Parse error at line 1, col 6: expected end of input")).toBe(true);
  });

  it("counts lines in string input", () => {
    const e = thrown(() => pair(tag("ab\n"), tag("cd")).parseAll("ab\nxx"));
    expect(e.offset).toBe(3);
    expect(e.line).toBe(2);
    expect(e.col).toBe(1);
  });

  it("reports byte offsets for binary input", () => {
    const e = thrown(() => beU16().parseAll(Uint8Array.of(1)));
    expect(e.message).toBe("Parse error at offset 0: error: Eof (expected 2 bytes)");
    expect(e.line).toBeUndefined();
  });

  it("reports incomplete input at the start", () => {
    const e = thrown(() => streaming.tag("abc").parseAll("ab"));
    expect(e.message).toBe("Parse error at line 1, col 1: incomplete input: 1 more needed\n  ...ab...");
  });
});
