/**
 * @strand/parser
 *
 * Parser combinators over strings, byte arrays and custom sliceable input.
 *
 * Provides:
 * - Repetition, folding, separated-list and fixed-arity combinators with
 *   zero-progress detection
 * - Length-prefixed combinators for binary formats
 * - A three-way failure signal: recoverable `error`, fatal `failure`,
 *   `incomplete` input
 * - Capacity-clamped pre-allocation for counts read from untrusted input
 *
 * @module
 */

// Core types
export type { ParseResult, Parser, Err, Needed, ErrorKind } from "./types.js";
export type { Input, SliceableInput, SizeLike } from "./input.js";
export { takeSplit, toUsize } from "./input.js";

// Errors
export { ParseError, ParseException, describeError, type ErrorFrame } from "./error.js";

// Parser construction
export { mkParser, ok, error, failure, incomplete, errorAt, failureAt, forward } from "./parser.js";

// Repetition
export {
  many0,
  many1,
  many0Count,
  many1Count,
  manyMN,
  many,
  manyTill,
  separatedList0,
  separatedList1,
  count,
  fill,
} from "./multi.js";

// Folding
export { foldMany0, foldMany1, foldManyMN, fold } from "./fold.js";

// Length-prefixed
export { lengthData, lengthValue, lengthCount } from "./length.js";

// Ranges
export {
  exactly,
  between,
  range,
  atLeast,
  atMost,
  fewerThan,
  unbounded,
  toRange,
  describeRange,
  type RepeatRange,
  type RangeLike,
} from "./range.js";

// Capacity clamp
export {
  MAX_INITIAL_CAPACITY_BYTES,
  DEFAULT_ELEMENT_SIZE,
  initialCapacity,
  Reservation,
  type CapacityOptions,
} from "./capacity.js";

// Configuration
export { config, type StrandConfig } from "./config.js";

// Sequencing and choice
export { map, verify, pair, preceded, terminated, alt, opt, not, cut, complete, lazy } from "./combinators.js";

// Primitives (complete input)
export {
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
} from "./primitives.js";

// Primitives (partial input)
export * as streaming from "./streaming.js";
