import { describe, it, expect } from "vitest";
import { parseGrid } from "./mapGrid.js";
import { DIRS8, neighbors } from "./neighbors.js";

const open3x3 = parseGrid("   \n   \n   ");

describe("neighbors", () => {
  it("yields down, right, left, up in that order", () => {
    expect([...neighbors(open3x3, [1, 1])]).toEqual([
      [1, 2],
      [2, 1],
      [0, 1],
      [1, 0],
    ]);
  });

  it("drops cells outside the grid", () => {
    expect([...neighbors(open3x3, [0, 0])]).toEqual([
      [0, 1],
      [1, 0],
    ]);
    expect([...neighbors(open3x3, [2, 2])]).toEqual([
      [1, 2],
      [2, 1],
    ]);
  });

  it("adds diagonals after the four main directions for DIRS8", () => {
    expect([...neighbors(open3x3, [0, 0], DIRS8)]).toEqual([
      [0, 1],
      [1, 0],
      [1, 1],
    ]);
    expect([...neighbors(open3x3, [1, 1], DIRS8)]).toHaveLength(8);
  });

  it("recomputes on every call", () => {
    const first = neighbors(open3x3, [1, 0]);
    expect([...first]).toHaveLength(3);
    expect([...first]).toEqual([]);
    expect([...neighbors(open3x3, [1, 0])]).toEqual([
      [1, 1],
      [2, 0],
      [0, 0],
    ]);
  });
});
