import type { Grid, Position } from "../grid/mapGrid.js";
import { ConfigError } from "../errors.js";
import { patrolStrategy } from "./patrol.js";
import { randomStep } from "./randomWalk.js";
import { nextStepTowardNearestDestination } from "./shortestPath.js";
import type { MoveStrategy, Rng, StrategyName } from "./types.js";

export const STRATEGY_NAMES: readonly StrategyName[] = [
  "random",
  "shortest-path",
  "patrol",
];

export function isStrategyName(value: string): value is StrategyName {
  return (STRATEGY_NAMES as readonly string[]).includes(value);
}

/** 무작위 보행: 기억 없음, 틱마다 독립 */
export function randomWalkStrategy(rng: Rng): MoveStrategy {
  return {
    name: "random",
    nextState: ({ grid, agent }) => ({
      ...agent,
      pos: randomStep(grid, agent.pos, rng),
    }),
  };
}

/** 최단 경로 추적: 매 틱 현재 칸에서 BFS 재계산 */
export function shortestPathStrategy(): MoveStrategy {
  return {
    name: "shortest-path",
    nextState: ({ grid, agent }) => ({
      ...agent,
      pos: nextStepTowardNearestDestination(grid, agent.pos),
    }),
  };
}

export type StrategyOptions = {
  grid: Grid;
  rng: Rng;
  route?: readonly Position[];
};

export function createStrategy(
  name: StrategyName,
  { grid, rng, route }: StrategyOptions,
): MoveStrategy {
  switch (name) {
    case "random":
      return randomWalkStrategy(rng);
    case "shortest-path":
      return shortestPathStrategy();
    case "patrol":
      if (!route) {
        throw new ConfigError("patrol strategy requires a route");
      }
      return patrolStrategy(grid, route);
  }
}
