import { describe, expect, it } from "vitest";
import { memoryLogger } from "../log.js";
import { linkage, orderByLinkage, pairwiseDistances } from "../order_by_linkage.js";
import type { NumericMatrix } from "../util.js";

const matrix = (rows: Record<string, number[]>): NumericMatrix => ({
  rows: Object.keys(rows),
  columns: ["v"],
  values: Object.values(rows),
});

describe("pairwiseDistances", () => {
  it("computes symmetric distances", () => {
    const d = pairwiseDistances(
      [
        [0, 0],
        [3, 4],
      ],
      "euclidean",
    );
    expect(Array.from(d)).toEqual([0, 5, 5, 0]);
    expect(Array.from(pairwiseDistances([[0, 0], [3, 4]], "cityblock"))).toEqual([0, 7, 7, 0]);
    expect(Array.from(pairwiseDistances([[0, 0], [3, 4]], "chebyshev"))).toEqual([0, 4, 4, 0]);
  });
});

describe("linkage", () => {
  it("merges the closest pair first and numbers new clusters after the leaves", () => {
    const d = pairwiseDistances([[0], [10], [1], [11]], "euclidean");
    const steps = linkage(d, 4, "single");
    expect(steps).toEqual([
      { left: 0, right: 2, dist: 1, size: 2 },
      { left: 1, right: 3, dist: 1, size: 2 },
      { left: 4, right: 5, dist: 9, size: 4 },
    ]);
  });
});

describe("orderByLinkage", () => {
  it("places similar rows next to each other", () => {
    const m = matrix({ a: [0], b: [10], c: [1], d: [11] });
    expect(orderByLinkage(m)).toEqual(["a", "c", "b", "d"]);
  });

  it("is deterministic", () => {
    const m = matrix({ p: [5, 1], q: [0, 0], r: [5, 2], s: [1, 0], t: [9, 9] });
    const first = orderByLinkage(m, { method: "average" });
    expect(orderByLinkage(m, { method: "average" })).toEqual(first);
    expect([...first].sort()).toEqual(["p", "q", "r", "s", "t"]);
  });

  it("logs the method and metric used", () => {
    const log = memoryLogger();
    orderByLinkage(matrix({ a: [0], b: [1] }), { method: "complete", metric: "cityblock", logger: log });
    expect(log.lines).toEqual(["INFO Ordering 2 rows by complete linkage and cityblock distances"]);
  });

  it("requires at least two rows", () => {
    expect(() => orderByLinkage(matrix({ a: [0] }))).toThrow(
      "Cannot order 1 row(s) by linkage clustering; at least two are required",
    );
  });

  it("rejects non-finite values", () => {
    expect(() => orderByLinkage(matrix({ a: [0], b: [Number.NaN] }))).toThrow(
      "Cannot order rows containing non-finite values",
    );
  });
});
