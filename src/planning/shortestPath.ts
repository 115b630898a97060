import { NoReachableDestinationError } from "../errors.js";
import {
  keyOf,
  terrainAt,
  type Grid,
  type Position,
} from "../grid/mapGrid.js";
import { neighbors } from "../grid/neighbors.js";
import { Terrain } from "../grid/terrain.js";

const passable = (t: Terrain) =>
  t === Terrain.Empty || t === Terrain.Destination;

/**
 * BFS parent 맵으로 시작→목표 경로 추적 (셀 리스트 반환)
 */
export function tracePath(
  target: Position,
  parent: Map<string, Position | null>,
): Position[] {
  const path: Position[] = [];
  let cur: Position | null = target;
  while (cur !== null) {
    path.unshift(cur);
    cur = parent.get(keyOf(cur)) ?? null;
  }
  return path;
}

/**
 * 가장 가까운 Destination 칸까지의 경로 [start, ..., destination].
 * 4방향만, Empty/Destination 칸만 통과. 동거리 목표는 이웃 순서(하, 우, 좌, 상)
 * + FIFO 발견 순서로 결정된다. 도달 불가면 null.
 */
export function findPathToNearestDestination(
  grid: Grid,
  start: Position,
): Position[] | null {
  // 범위 밖 시작점은 OutOfBoundsError
  terrainAt(grid, start);

  const parent = new Map<string, Position | null>();
  parent.set(keyOf(start), null);
  const queue: Position[] = [start];
  let head = 0;

  while (head < queue.length) {
    const cur = queue[head++];
    if (terrainAt(grid, cur) === Terrain.Destination) {
      return tracePath(cur, parent);
    }
    for (const next of neighbors(grid, cur)) {
      if (!passable(terrainAt(grid, next))) continue;
      const k = keyOf(next);
      if (parent.has(k)) continue;
      parent.set(k, cur);
      queue.push(next);
    }
  }
  return null;
}

/**
 * 가장 가까운 도착지 방향으로 한 칸. 이미 도착지면 제자리.
 * @throws NoReachableDestinationError 프런티어를 다 돌아도 도착지가 없을 때
 */
export function nextStepTowardNearestDestination(
  grid: Grid,
  pos: Position,
): Position {
  const path = findPathToNearestDestination(grid, pos);
  if (path === null) {
    throw new NoReachableDestinationError(pos);
  }
  return path.length > 1 ? path[1] : path[0];
}
