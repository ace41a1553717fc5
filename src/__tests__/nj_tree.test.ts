import { describe, expect, it } from "vitest";
import { makeNjTree } from "../nj_tree.js";

describe("makeNjTree", () => {
  it("joins the closest pairs and lays leaves out top to bottom", () => {
    const tree = makeNjTree(
      ["A", "B", "C", "D"],
      [
        [0, 2, 6, 6],
        [2, 0, 6, 6],
        [6, 6, 0, 2],
        [6, 6, 2, 0],
      ],
    );
    expect(tree.leafOrder).toEqual(["A", "B", "C", "D"]);
    expect(tree.maxX).toBe(3);
    expect(tree.extensionX).toEqual([]);
    expect(tree.x.length).toBe(tree.y.length);
    expect(tree.text.length).toBe(tree.x.length);
  });

  it("extends tips that stop short of the deepest leaf", () => {
    const tree = makeNjTree(
      ["A", "B", "C"],
      [
        [0, 2, 4],
        [2, 0, 4],
        [4, 4, 0],
      ],
    );
    expect(tree.leafOrder).toEqual(["C", "A", "B"]);
    expect(tree.maxX).toBe(2.5);
    expect(tree.extensionX).toEqual([1.5, 2.5, null]);
    expect(tree.extensionY).toEqual([0, 0, null]);
    expect(tree.x.slice(0, 6)).toEqual([0, 0, null, 0, 1.5, null]);
    expect(tree.y.slice(0, 6)).toEqual([0, 1.5, null, 0, 0, null]);
    expect(tree.text.slice(3, 9)).toEqual(["C", "C", "", "Branch length: 1.5", "Branch length: 1.5", ""]);
  });

  it("needs at least two members", () => {
    expect(() => makeNjTree(["A"], [[0]])).toThrow("A tree needs at least two members, got 1");
  });

  it("needs a square table", () => {
    expect(() => makeNjTree(["A", "B"], [[0, 1]])).toThrow("Distance table must be 2x2");
  });
});
