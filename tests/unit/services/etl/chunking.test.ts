import { describe, it, expect } from "vitest";

import { chunk } from "../../../../src/services/etl/chunking.js";

describe("services/etl/chunking", () => {
  it("should split 2500 items into batches of 1000, 1000 and 500", () => {
    const items = Array.from({ length: 2500 }, (_, i) => i + 1);

    const batches = [...chunk(items, 1000)];

    expect(batches.map((batch) => batch.length)).toEqual([1000, 1000, 500]);
    expect(batches.flat()).toEqual(items);
    expect(batches[2]?.[0]).toBe(2001);
  });

  it("should emit no trailing empty batch when the size divides evenly", () => {
    const batches = [...chunk([1, 2, 3, 4], 2)];

    expect(batches).toEqual([
      [1, 2],
      [3, 4],
    ]);
  });

  it("should emit nothing for an empty sequence", () => {
    expect([...chunk([], 1000)]).toEqual([]);
  });

  it("should accept any iterable", () => {
    const batches = [...chunk(new Set(["a", "b", "c"]), 2)];

    expect(batches).toEqual([["a", "b"], ["c"]]);
  });

  it("should reject a batch size below one", () => {
    expect(() => [...chunk([1], 0)]).toThrow(
      "Batch size must be a positive integer, got 0"
    );
  });

  it("should reject a fractional batch size", () => {
    expect(() => [...chunk([1], 2.5)]).toThrow(RangeError);
  });
});
