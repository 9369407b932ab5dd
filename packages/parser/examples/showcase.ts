/**
 * @strand/parser Showcase
 *
 * Self-documenting examples of the repetition, folding and length-prefixed
 * combinators. Every claim is checked with an assertion, so the file fails
 * loudly if behaviour drifts.
 *
 * Run: npx tsx packages/parser/examples/showcase.ts
 */

import assert from "node:assert/strict";

import {
  // Primitives
  tag, char, digit0, digit1, alpha1, space0, beU8, beU16,

  // Combinators
  map, preceded, terminated, alt, cut,

  // Repetition
  many0, many1, many0Count, manyMN, many, manyTill,
  separatedList0, separatedList1, count, fill,

  // Folding
  foldMany0, fold,

  // Length-prefixed
  lengthData, lengthValue, lengthCount,

  // Ranges
  between, atLeast,

  // Errors and configuration
  ParseException, describeError, config,

  // Streaming primitives
  streaming,

  type Parser,
} from "../src/index.js";

// ============================================================================
// 1. REPETITION: collect until the child stops matching
// ============================================================================

const abcs = many0(tag("abc"));
assert.deepEqual(abcs.parse("abcabc123"), { ok: true, rest: "123", value: ["abc", "abc"] });
assert.deepEqual(abcs.parse(""), { ok: true, rest: "", value: [] });

// many1 needs a first match
const r1 = many1(tag("abc")).parse("123");
assert.ok(!r1.ok && r1.err.type === "error");

// Counting without collecting
assert.deepEqual(many0Count(char("x")).parse("xxxy"), { ok: true, rest: "y", value: 3 });

// Bounded: stop at max, insist on min
assert.deepEqual(manyMN(0, 2, tag("abc")).parse("abcabcabc"), { ok: true, rest: "abc", value: ["abc", "abc"] });
assert.ok(!manyMN(2, 3, tag("abc")).parse("abc").ok);

// ============================================================================
// 2. ZERO-PROGRESS SAFETY: a child that matches nothing is reported, not looped
// ============================================================================

const stuck = many0(digit0()).parse("abc");
assert.ok(!stuck.ok && stuck.err.type === "error" && stuck.err.error.kind === "Many0");

// ============================================================================
// 3. RANGES: one combinator for every repetition shape
// ============================================================================

assert.deepEqual(many(2, tag("ab")).parse("ababab"), { ok: true, rest: "ab", value: ["ab", "ab"] });
assert.deepEqual(many(between(1, 3), tag("ab")).parse("abx"), { ok: true, rest: "x", value: ["ab"] });

// An inverted range is a programming error surfaced as a failure
const inverted = many(between(3, 1), tag("ab")).parse("ab");
assert.ok(!inverted.ok && inverted.err.type === "failure");

// ============================================================================
// 4. FOLDING: accumulate instead of collecting
// ============================================================================

const number = terminated(map(digit1(), Number), space0());
const sum = foldMany0(number, () => 0, (acc, n) => acc + n);
assert.deepEqual(sum.parse("1 2 3 !"), { ok: true, rest: "!", value: 6 });

const atLeastTwo = fold(atLeast(2), char("a"), () => 0, (n) => n + 1);
assert.deepEqual(atLeastTwo.parse("aaab"), { ok: true, rest: "b", value: 3 });

// ============================================================================
// 5. TERMINATORS AND SEPARATORS
// ============================================================================

assert.deepEqual(manyTill(alpha1(), char(".")).parse("abc.rest"), {
  ok: true,
  rest: "rest",
  value: [["abc"], "."],
});

const csv = separatedList1(char(","), digit1());
assert.deepEqual(csv.parse("1,22,333"), { ok: true, rest: "", value: ["1", "22", "333"] });

// The separator is only consumed when an element follows it
assert.deepEqual(separatedList0(tag("|"), tag("abc")).parse("abc|def"), { ok: true, rest: "|def", value: ["abc"] });

// ============================================================================
// 6. FIXED ARITY
// ============================================================================

assert.deepEqual(count(tag("abc"), 2).parse("abcabcabc"), { ok: true, rest: "abc", value: ["abc", "abc"] });

const slots = ["", ""];
assert.ok(fill(alpha1(), slots).parse("ab").ok === false);
assert.ok(fill(terminated(alpha1(), space0()), slots).parse("ab cd").ok);
assert.deepEqual(slots, ["ab", "cd"]);

// ============================================================================
// 7. LENGTH-PREFIXED BINARY DATA
// ============================================================================

const frame = Uint8Array.of(0x00, 0x03, 0x61, 0x62, 0x63, 0x65, 0x66, 0x67);

const data = lengthData(beU16()).parse(frame);
assert.deepEqual(data.ok && Array.from(data.value), [0x61, 0x62, 0x63]);

// The inner parser sees only the carved slice
const inner = lengthValue(beU16(), tag(Uint8Array.of(0x61, 0x62, 0x63))).parse(frame);
assert.ok(inner.ok);

// A hostile count does not drive allocation; parsing just runs out of input
const hostile = lengthCount(beU8(), beU8()).parse(Uint8Array.of(0xff, 1, 2));
assert.ok(!hostile.ok && hostile.err.type === "error");

// ============================================================================
// 8. STREAMING INPUT: report how much more is needed
// ============================================================================

const partial = many0(streaming.tag("abc")).parse("abcab");
assert.deepEqual(partial, { ok: false, err: { type: "incomplete", needed: { type: "size", size: 1 } } });
if (!partial.ok) assert.equal(describeError(partial.err), "incomplete input: 1 more needed");

// ============================================================================
// 9. RECOVERY AND COMMITMENT
// ============================================================================

const keyword: Parser<string, string> = alt(tag("let"), tag("var"));
const binding = preceded(cut(keyword), preceded(space0(), alpha1()));
const committed = binding.parse("const x");
assert.ok(!committed.ok && committed.err.type === "failure");

// ============================================================================
// 10. WHOLE-INPUT PARSING AND CONFIGURATION
// ============================================================================

try {
  csv.parseAll("1,2,x");
  assert.fail("expected a ParseException");
} catch (e) {
  if (!(e instanceof ParseException)) throw e;
  assert.equal(e.offset, 3);
}

config.set({ maxInitialCapacityBytes: 1024 });
assert.equal(config.get("maxInitialCapacityBytes"), 1024);
config.reset();

console.log("showcase: all assertions passed");
