import {
  EmptyMapError,
  InvalidMapCharacterError,
  OutOfBoundsError,
} from "../errors.js";
import { CHAR_BY_TERRAIN, TERRAIN_BY_CHAR, Terrain } from "./terrain.js";

/** (column, row) = (x, y) */
export type Position = [number, number];

export type Grid = {
  readonly width: number;
  readonly height: number;
  /** cells[y][x], 생성 후 읽기 전용 */
  readonly cells: ReadonlyArray<ReadonlyArray<Terrain>>;
};

export const keyOf = ([x, y]: Position): string => `${x},${y}`;

export const samePosition = (a: Position, b: Position): boolean =>
  a[0] === b[0] && a[1] === b[1];

/**
 * Parse a text map into a rectangular, frozen grid.
 * Empty lines are skipped, shorter lines are right-padded with Empty so
 * width equals the longest line.
 */
export function parseGrid(description: string): Grid {
  const lines = description
    .split("\n")
    .map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line))
    .filter((line) => line.length > 0);
  if (lines.length === 0) {
    throw new EmptyMapError();
  }

  const rows: Terrain[][] = lines.map((line, y) =>
    Array.from(line, (ch, x) => {
      const terrain = TERRAIN_BY_CHAR.get(ch);
      if (terrain === undefined) throw new InvalidMapCharacterError(ch, [x, y]);
      return terrain;
    }),
  );

  const width = rows.reduce((w, row) => Math.max(w, row.length), 0);
  for (const row of rows) {
    while (row.length < width) row.push(Terrain.Empty);
  }

  return Object.freeze({
    width,
    height: rows.length,
    cells: Object.freeze(rows.map((row) => Object.freeze(row))),
  });
}

export function inBounds(grid: Grid, [x, y]: Position): boolean {
  return x >= 0 && x < grid.width && y >= 0 && y < grid.height;
}

export function terrainAt(grid: Grid, pos: Position): Terrain {
  if (!inBounds(grid, pos)) {
    throw new OutOfBoundsError(pos, grid.width, grid.height);
  }
  return grid.cells[pos[1]][pos[0]];
}

/** 특정 지형 칸 목록 (row-major 순서) */
export function findCells(grid: Grid, terrain: Terrain): Position[] {
  const out: Position[] = [];
  grid.cells.forEach((row, y) => {
    row.forEach((cell, x) => {
      if (cell === terrain) out.push([x, y]);
    });
  });
  return out;
}

/** parseGrid의 역변환. 패딩된 칸은 공백으로 남는다. */
export function gridToText(grid: Grid): string {
  return grid.cells
    .map((row) => row.map((cell) => CHAR_BY_TERRAIN[cell]).join(""))
    .join("\n");
}
