import {
  InvalidAgentPositionError,
  NoReachableDestinationError,
} from "../errors.js";
import {
  findCells,
  inBounds,
  samePosition,
  terrainAt,
  type Grid,
  type Position,
} from "../grid/mapGrid.js";
import { Terrain } from "../grid/terrain.js";
import { MoveOutcome, type AgentState } from "../domain/agent.js";
import { randomStep } from "../planning/randomWalk.js";
import { createRng } from "../planning/rng.js";
import type { MoveStrategy, Rng } from "../planning/types.js";

export type { AgentState } from "../domain/agent.js";

/**
 * 도착지에 닿을 수 없는 에이전트 처리.
 * - random: 그 틱만 무작위 보행
 * - stay: 제자리 (에러는 리포트에 남김)
 */
export type FallbackPolicy = "random" | "stay";

export type SimulationOptions = {
  grid: Grid;
  agents: Position[];
  strategy: MoveStrategy;
  fallback?: FallbackPolicy;
  rng?: Rng;
};

/**
 * 외부(렌더러)에는 읽기 전용. 에이전트 위치와 틱 수는
 * getAgentPositions / getTick으로만 읽는다.
 */
export type Simulation = {
  readonly grid: Grid;
  readonly strategy: MoveStrategy;
  readonly fallback: FallbackPolicy;
  readonly rng: Rng;
};

/** advance만 갱신하는 내부 상태 */
type SimulationState = {
  agents: AgentState[];
  tick: number;
};

const states = new WeakMap<Simulation, SimulationState>();

function stateOf(sim: Simulation): SimulationState {
  const state = states.get(sim);
  if (!state) {
    throw new Error("Simulation was not created by createSimulation");
  }
  return state;
}

const copyPosition = ([x, y]: Position): Position => [x, y];

export type AgentMove = {
  index: number;
  from: Position;
  to: Position;
  outcome: MoveOutcome;
  error?: NoReachableDestinationError;
};

export type TickReport = {
  tick: number;
  moves: AgentMove[];
};

function checkAgentPosition(grid: Grid, pos: Position): void {
  if (!inBounds(grid, pos)) {
    throw new InvalidAgentPositionError(pos, "outside the grid");
  }
  if (terrainAt(grid, pos) === Terrain.Wall) {
    throw new InvalidAgentPositionError(pos, "on a wall");
  }
}

export function createSimulation(options: SimulationOptions): Simulation {
  const { grid, strategy, fallback = "random", rng = createRng() } = options;
  const agents = options.agents.map((p): AgentState => {
    const pos: Position = [p[0], p[1]];
    checkAgentPosition(grid, pos);
    return strategy.initAgent ? strategy.initAgent(grid, pos) : { pos };
  });
  const sim: Simulation = { grid, strategy, fallback, rng };
  states.set(sim, { agents, tick: 0 });
  return sim;
}

/**
 * 한 틱: 모든 에이전트를 고정 순서로 한 번씩 이동.
 * 에이전트끼리는 서로를 보지 않는다 (충돌·칸 용량 없음).
 * 도착지 도달 불가는 해당 에이전트에만 fallback을 적용하고 나머지는 계속 진행.
 */
export function advance(sim: Simulation): TickReport {
  const { grid, strategy } = sim;
  const state = stateOf(sim);
  const moves: AgentMove[] = [];

  // 리포트와 내부 상태는 위치 배열을 공유하지 않는다
  state.agents.forEach((agent, index) => {
    const from = agent.pos;
    try {
      const next = strategy.nextState({ grid, agent });
      state.agents[index] = { ...next, pos: copyPosition(next.pos) };
      moves.push({
        index,
        from: copyPosition(from),
        to: copyPosition(next.pos),
        outcome: samePosition(from, next.pos)
          ? MoveOutcome.STAYED
          : MoveOutcome.MOVED,
      });
    } catch (err) {
      if (!(err instanceof NoReachableDestinationError)) throw err;
      const to =
        sim.fallback === "random" ? randomStep(grid, from, sim.rng) : from;
      state.agents[index] = { ...agent, pos: copyPosition(to) };
      moves.push({
        index,
        from: copyPosition(from),
        to: copyPosition(to),
        outcome: MoveOutcome.FALLBACK,
        error: err,
      });
    }
  });

  state.tick += 1;
  return { tick: state.tick, moves };
}

export function getGrid(sim: Simulation): Grid {
  return sim.grid;
}

/** 렌더러용 복사본 */
export function getAgentPositions(sim: Simulation): Position[] {
  return stateOf(sim).agents.map(({ pos }) => copyPosition(pos));
}

export function getTick(sim: Simulation): number {
  return stateOf(sim).tick;
}

/**
 * SpawnPoint 칸(row-major)에 에이전트 배치.
 * count가 출발 지점 수보다 크면 순환해서 겹쳐 배치한다.
 */
export function spawnAgentsFromGrid(grid: Grid, count?: number): Position[] {
  const spawns = findCells(grid, Terrain.SpawnPoint);
  if (spawns.length === 0) return [];
  const n = count ?? spawns.length;
  return Array.from({ length: n }, (_, i) => {
    const [x, y] = spawns[i % spawns.length];
    return [x, y];
  });
}
