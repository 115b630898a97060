import { terrainAt, type Grid, type Position } from "../grid/mapGrid.js";
import { neighbors } from "../grid/neighbors.js";
import { Terrain } from "../grid/terrain.js";
import type { Rng } from "./types.js";

/**
 * 4방향 이웃 중 Empty 칸 하나를 균등하게 고른다.
 * SpawnPoint/Destination은 후보가 아님. 후보가 없으면 제자리.
 */
export function randomStep(grid: Grid, pos: Position, rng: Rng): Position {
  const candidates: Position[] = [];
  for (const next of neighbors(grid, pos)) {
    if (terrainAt(grid, next) === Terrain.Empty) candidates.push(next);
  }
  if (candidates.length === 0) return pos;
  const i = Math.min(
    candidates.length - 1,
    Math.floor(rng() * candidates.length),
  );
  return candidates[i];
}
