import { describe, it, expect } from "vitest";
import {
  findCells,
  gridToText,
  inBounds,
  parseGrid,
  terrainAt,
  type Position,
} from "./mapGrid.js";
import { Terrain } from "./terrain.js";
import {
  EmptyMapError,
  InvalidMapCharacterError,
  OutOfBoundsError,
} from "../errors.js";

describe("parseGrid", () => {
  it("maps each character to its terrain class", () => {
    const grid = parseGrid("^ #\n# $");
    expect(grid.width).toBe(3);
    expect(grid.height).toBe(2);
    expect(grid.cells).toEqual([
      [Terrain.SpawnPoint, Terrain.Empty, Terrain.Wall],
      [Terrain.Wall, Terrain.Empty, Terrain.Destination],
    ]);
  });

  it("pads short rows with Empty up to the longest line", () => {
    const grid = parseGrid("#\n###\n##");
    expect(grid.width).toBe(3);
    for (const row of grid.cells) expect(row).toHaveLength(3);
    expect(grid.cells[0]).toEqual([Terrain.Wall, Terrain.Empty, Terrain.Empty]);
    expect(grid.cells[2]).toEqual([Terrain.Wall, Terrain.Wall, Terrain.Empty]);
  });

  it("parses a very tall map", () => {
    const grid = parseGrid(Array.from({ length: 200_000 }, () => " ").join("\n"));
    expect(grid.height).toBe(200_000);
    expect(grid.width).toBe(1);
  });

  it("skips empty lines and strips carriage returns", () => {
    const grid = parseGrid("# \r\n\r\n\n $\n");
    expect(grid.height).toBe(2);
    expect(grid.width).toBe(2);
    expect(grid.cells[1]).toEqual([Terrain.Empty, Terrain.Destination]);
  });

  it("rejects unknown characters with the offending char and position", () => {
    let caught: unknown;
    try {
      parseGrid("  \n x");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidMapCharacterError);
    expect(caught).toMatchObject({
      code: "INVALID_MAP_CHARACTER",
      char: "x",
      pos: [1, 1],
    });
  });

  it("rejects a description without lines", () => {
    expect(() => parseGrid("")).toThrow(EmptyMapError);
    expect(() => parseGrid("\n\n")).toThrow(EmptyMapError);
  });

  it("freezes the parsed cells", () => {
    const grid = parseGrid("# $");
    expect(Object.isFrozen(grid)).toBe(true);
    expect(Object.isFrozen(grid.cells)).toBe(true);
    expect(Object.isFrozen(grid.cells[0])).toBe(true);
  });
});

describe("inBounds", () => {
  const grid = parseGrid("^ #\n# $");

  it("accepts row and column 0", () => {
    expect(inBounds(grid, [0, 0])).toBe(true);
    expect(inBounds(grid, [0, 1])).toBe(true);
    expect(inBounds(grid, [2, 0])).toBe(true);
  });

  it("matches 0 <= x < w and 0 <= y < h everywhere around the grid", () => {
    for (let x = -2; x <= 4; x++) {
      for (let y = -2; y <= 3; y++) {
        const expected = x >= 0 && x < 3 && y >= 0 && y < 2;
        expect(inBounds(grid, [x, y])).toBe(expected);
      }
    }
  });
});

describe("terrainAt", () => {
  const grid = parseGrid("^ #\n# $");

  it("returns the stored class", () => {
    expect(terrainAt(grid, [0, 0])).toBe(Terrain.SpawnPoint);
    expect(terrainAt(grid, [2, 1])).toBe(Terrain.Destination);
    expect(terrainAt(grid, [0, 1])).toBe(Terrain.Wall);
  });

  it("throws OutOfBounds outside the grid", () => {
    expect(() => terrainAt(grid, [3, 0])).toThrow(OutOfBoundsError);
    expect(() => terrainAt(grid, [0, -1])).toThrow(
      "Position (0, -1) is outside the 3x2 grid",
    );
  });
});

describe("findCells / gridToText", () => {
  it("lists cells of one class in row-major order", () => {
    const grid = parseGrid("$ ^\n^ $");
    const spawns: Position[] = findCells(grid, Terrain.SpawnPoint);
    expect(spawns).toEqual([
      [2, 0],
      [0, 1],
    ]);
  });

  it("writes the map back as text, padding included", () => {
    expect(gridToText(parseGrid("^ #\n# $"))).toBe("^ #\n# $");
    expect(gridToText(parseGrid("#\n##"))).toBe("# \n##");
  });
});
