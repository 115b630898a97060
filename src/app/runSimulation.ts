import { parseGrid, type Position } from "../grid/mapGrid.js";
import { createRng } from "../planning/rng.js";
import { createStrategy } from "../planning/strategies.js";
import { spreadAlongRoute } from "../planning/patrol.js";
import { renderFrame } from "../render/renderAscii.js";
import {
  advance,
  createSimulation,
  getAgentPositions,
  getGrid,
  getTick,
  spawnAgentsFromGrid,
  type Simulation,
} from "../sim/simulate.js";
import { MoveOutcome } from "../domain/agent.js";
import type { SimConfig } from "../config/loadConfig.js";
import { createTickDriver } from "./tickDriver.js";

export type RunOptions = {
  config: SimConfig;
  mapText: string;
  /** 프레임 출력 (기본: stdout) */
  write?: (frame: string) => void;
};

export type RunResult = {
  ticks: number;
  positions: Position[];
};

/** 설정 + 맵 텍스트로 시뮬레이션 구성 (파싱 실패 등은 여기서 throw) */
export function buildSimulation(config: SimConfig, mapText: string): Simulation {
  console.time("parse");
  const grid = parseGrid(mapText);
  console.timeEnd("parse");
  console.log("grid:", { w: grid.width, h: grid.height });

  const rng = createRng(config.seed);
  const strategy = createStrategy(config.strategy, {
    grid,
    rng,
    route: config.route,
  });
  const agents =
    config.strategy === "patrol" && config.route
      ? spreadAlongRoute(config.route, config.agentCount ?? 1)
      : spawnAgentsFromGrid(grid, config.agentCount);
  console.log("agents:", agents.length, "strategy:", strategy.name);

  return createSimulation({
    grid,
    agents,
    strategy,
    fallback: config.fallback,
    rng,
  });
}

export type DriveOptions = {
  tickMs: number;
  /** 0 = 무제한 */
  maxTicks: number;
  write: (frame: string) => void;
};

/**
 * 틱 드라이버로 시뮬레이션 실행.
 * maxTicks 도달 또는 SIGINT(terminate)에서 끝나고 최종 상태로 resolve.
 * 틱 도중 에러가 나면 드라이버를 멈추고 reject.
 */
export function driveSimulation(
  sim: Simulation,
  { tickMs, maxTicks, write }: DriveOptions,
): Promise<RunResult> {
  const draw = () => {
    write(`tick ${getTick(sim)}\n${renderFrame(getGrid(sim), getAgentPositions(sim))}`);
  };

  return new Promise<RunResult>((resolve, reject) => {
    let failure: unknown = null;
    const onSigint = () => driver.stop();

    const driver = createTickDriver({
      tickMs,
      onTick: () => {
        try {
          const report = advance(sim);
          const fallbacks = report.moves.filter(
            (m) => m.outcome === MoveOutcome.FALLBACK,
          );
          if (fallbacks.length > 0) {
            console.log(
              `tick ${report.tick}: no reachable destination for agents`,
              fallbacks.map((m) => m.index),
            );
          }
          draw();
          if (maxTicks > 0 && report.tick >= maxTicks) {
            driver.stop();
          }
        } catch (err) {
          failure = err;
          driver.stop();
        }
      },
      onTerminate: () => {
        process.off("SIGINT", onSigint);
        if (failure !== null) {
          reject(failure);
          return;
        }
        resolve({ ticks: getTick(sim), positions: getAgentPositions(sim) });
      },
    });

    process.once("SIGINT", onSigint);
    draw();
    driver.start();
  });
}

/** 설정 + 맵 텍스트로 구성 후 실행. 구성 단계 에러는 동기적으로 throw */
export function runSimulation({
  config,
  mapText,
  write = (frame) => process.stdout.write(frame + "\n"),
}: RunOptions): Promise<RunResult> {
  const sim = buildSimulation(config, mapText);
  return driveSimulation(sim, {
    tickMs: config.tickMs,
    maxTicks: config.maxTicks,
    write,
  });
}
