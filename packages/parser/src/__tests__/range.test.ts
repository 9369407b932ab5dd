import { describe, it, expect } from "vitest";
import { exactly, between, range, atLeast, atMost, fewerThan, unbounded, toRange, describeRange } from "../index.js";
import type { RepeatRange } from "../index.js";

function firstIndices(iter: Iterable<number>, limit: number): number[] {
  const out: number[] = [];
  for (const i of iter) {
    if (out.length === limit) break;
    out.push(i);
  }
  return out;
}

const counts = (r: RepeatRange, upTo: number): number[] =>
  Array.from({ length: upTo + 1 }, (_, i) => i).filter((n) => r.contains(n));

describe("exactly", () => {
  it("contains only its count", () => {
    expect(counts(exactly(3), 6)).toEqual([3]);
  });

  it("iterates up to its count", () => {
    expect([...exactly(3).boundedIter()]).toEqual([0, 1, 2]);
    expect([...exactly(3).saturatingIter()]).toEqual([0, 1, 2]);
  });

  it("is never inverted", () => {
    expect(exactly(0).isInverted()).toBe(false);
  });
});

describe("between", () => {
  it("includes both ends", () => {
    expect(counts(between(1, 3), 5)).toEqual([1, 2, 3]);
    expect([...between(1, 3).boundedIter()]).toEqual([0, 1, 2]);
  });

  it("is inverted when min > max", () => {
    expect(between(3, 1).isInverted()).toBe(true);
    expect(between(2, 2).isInverted()).toBe(false);
  });
});

describe("range", () => {
  it("excludes its end", () => {
    expect(counts(range(1, 4), 6)).toEqual([1, 2, 3]);
    expect([...range(1, 4).boundedIter()]).toEqual([0, 1, 2]);
  });

  it("is inverted unless start < end", () => {
    expect(range(2, 2).isInverted()).toBe(true);
    expect(range(3, 1).isInverted()).toBe(true);
    expect(range(1, 2).isInverted()).toBe(false);
  });
});

describe("atLeast", () => {
  it("has no upper bound", () => {
    expect(atLeast(2).contains(1)).toBe(false);
    expect(atLeast(2).contains(2)).toBe(true);
    expect(atLeast(2).contains(Number.MAX_SAFE_INTEGER)).toBe(true);
  });

  it("iterates without end when saturating", () => {
    expect(firstIndices(atLeast(2).saturatingIter(), 5)).toEqual([0, 1, 2, 3, 4]);
  });
});

describe("atMost / fewerThan", () => {
  it("atMost includes its bound", () => {
    expect(counts(atMost(2), 4)).toEqual([0, 1, 2]);
    expect([...atMost(2).boundedIter()]).toEqual([0, 1]);
  });

  it("fewerThan excludes its bound", () => {
    expect(counts(fewerThan(2), 4)).toEqual([0, 1]);
  });

  it("fewerThan(0) is empty but not inverted", () => {
    expect(fewerThan(0).isInverted()).toBe(false);
    expect(fewerThan(0).contains(0)).toBe(false);
    expect([...fewerThan(0).boundedIter()]).toEqual([]);
  });
});

describe("unbounded", () => {
  it("contains every count", () => {
    expect(counts(unbounded(), 3)).toEqual([0, 1, 2, 3]);
    expect(firstIndices(unbounded().boundedIter(), 3)).toEqual([0, 1, 2]);
  });
});

describe("toRange", () => {
  it("reads a plain number as an exact count", () => {
    expect(counts(toRange(4), 6)).toEqual([4]);
  });

  it("passes a range through", () => {
    const r = between(1, 2);
    expect(toRange(r)).toBe(r);
  });
});

describe("argument checks", () => {
  it("rejects negative and fractional bounds", () => {
    expect(() => exactly(-1)).toThrow(TypeError);
    expect(() => between(1.5, 2)).toThrow("min must be a non-negative integer, got 1.5");
    expect(() => atLeast(Number.NaN)).toThrow(TypeError);
  });
});

describe("display", () => {
  it("renders each shape", () => {
    expect(String(exactly(3))).toBe("3");
    expect(String(between(1, 3))).toBe("1..=3");
    expect(String(atLeast(2))).toBe("2..");
  });

  it("renders an empty half-open range", () => {
    expect(describeRange(fewerThan(0))).toBe("..<0");
  });

  it("labels a range without its own display form", () => {
    const custom: RepeatRange = {
      isInverted: () => true,
      contains: () => false,
      boundedIter: () => [],
      saturatingIter: () => [],
    };
    expect(describeRange(custom)).toBe("custom range");
  });
});
