/**
 * Helpers shared by the repetition, folding and length-prefixed combinators.
 */

import { initialCapacity, Reservation, type CapacityOptions } from "./capacity.js";
import { capacityLimits } from "./config.js";
import type { Input } from "./input.js";
import { debugLog } from "./log.js";
import { errorAt } from "./parser.js";
import type { ErrorKind, ParseResult } from "./types.js";

/**
 * Signal that a child parser succeeded without consuming input. Repeating it
 * would never terminate.
 */
export function zeroProgress<I extends Input, O>(input: I, kind: ErrorKind): ParseResult<I, O> {
  debugLog(kind, `child parser made no progress with ${input.length} units left`);
  return errorAt(input, kind);
}

/** Pre-size a result array for `requested` elements, clamped per configuration. */
export function reserve<T>(requested: number, scope: string, options?: CapacityOptions): Reservation<T> {
  const { elementSize, maxBytes } = capacityLimits(options);
  const capacity = initialCapacity(requested, elementSize, maxBytes);
  if (capacity < requested) {
    debugLog(scope, `initial capacity clamped from ${requested} to ${capacity}`);
  }
  return new Reservation<T>(capacity);
}

/** Reject counts that are programming errors rather than parse outcomes. */
export function checkCount(value: number, name: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new TypeError(`${name} must be a non-negative integer, got ${value}`);
  }
}
