import { InvalidAgentPositionError, InvalidRouteError } from "../errors.js";
import {
  inBounds,
  samePosition,
  terrainAt,
  type Grid,
  type Position,
} from "../grid/mapGrid.js";
import { Terrain } from "../grid/terrain.js";
import type { MoveStrategy } from "./types.js";

/** 경로 검증: 비어 있지 않고, 모든 지점이 범위 안 + 벽이 아님 */
export function validateRoute(grid: Grid, route: readonly Position[]): void {
  if (route.length === 0) {
    throw new InvalidRouteError("route is empty");
  }
  route.forEach((p, i) => {
    if (!inBounds(grid, p)) {
      throw new InvalidRouteError(`waypoint ${i} (${p[0]}, ${p[1]}) is out of bounds`);
    }
    if (terrainAt(grid, p) === Terrain.Wall) {
      throw new InvalidRouteError(`waypoint ${i} (${p[0]}, ${p[1]}) is a wall`);
    }
  });
}

/**
 * 고정 순찰 경로를 한 틱에 한 지점씩 순환.
 * 마지막 지점 다음은 처음 지점.
 */
export function patrolStrategy(
  grid: Grid,
  route: readonly Position[],
): MoveStrategy {
  validateRoute(grid, route);
  const waypoints = route.map((p): Position => [p[0], p[1]]);

  return {
    name: "patrol",
    initAgent(_grid, pos) {
      const routeIndex = waypoints.findIndex((p) => samePosition(p, pos));
      if (routeIndex < 0) {
        throw new InvalidAgentPositionError(pos, "not on the patrol route");
      }
      return { pos, routeIndex };
    },
    nextState({ agent }) {
      const routeIndex = ((agent.routeIndex ?? 0) + 1) % waypoints.length;
      const [x, y] = waypoints[routeIndex];
      return { pos: [x, y], routeIndex };
    },
  };
}

/** n개 에이전트를 경로 위에 고르게 배치 (시작 위치) */
export function spreadAlongRoute(
  route: readonly Position[],
  count: number,
): Position[] {
  if (route.length === 0) return [];
  return Array.from({ length: count }, (_, i) => {
    const [x, y] = route[Math.floor((i * route.length) / count)];
    return [x, y];
  });
}
