import { describe, it, expect } from "vitest";
import { parseGrid } from "../grid/mapGrid.js";
import { renderFrame } from "./renderAscii.js";

describe("renderFrame", () => {
  const grid = parseGrid("^ #\n# $");

  it("draws terrain symbols and agents on top", () => {
    expect(renderFrame(grid, [[1, 0]])).toBe("^*#\n# $");
    expect(renderFrame(grid, [[2, 1]])).toBe("^ #\n# *");
  });

  it("keeps every line at the grid width", () => {
    expect(renderFrame(parseGrid("#\n###"), [])).toBe("#  \n###");
  });

  it("skips agents outside the grid", () => {
    expect(renderFrame(grid, [[5, 5]])).toBe("^ #\n# $");
  });
});
