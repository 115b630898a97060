import { ConfigError } from "../errors.js";
import type { Position } from "../grid/mapGrid.js";
import { isStrategyName } from "../planning/strategies.js";
import type { StrategyName } from "../planning/types.js";
import type { FallbackPolicy } from "../sim/simulate.js";
import {
  DEFAULT_FALLBACK,
  DEFAULT_MAP_FILE,
  DEFAULT_MAX_TICKS,
  DEFAULT_STRATEGY,
} from "./constants.js";
import { PRESETS, isTickPresetName } from "./presets.js";

export type SimConfig = {
  mapPath: string;
  strategy: StrategyName;
  tickMs: number;
  /** 0 = 무제한 */
  maxTicks: number;
  /** 없으면 SpawnPoint 수 (patrol은 1) */
  agentCount: number | undefined;
  seed: string | undefined;
  fallback: FallbackPolicy;
  route: Position[] | undefined;
};

type Env = Record<string, string | undefined>;

function read(env: Env, name: string): string | undefined {
  return env[name]?.trim() || undefined;
}

function readInt(
  env: Env,
  name: string,
  min: number,
): number | undefined {
  const raw = read(env, name);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return n;
}

/** "3,0;3,1;3,2" → [[3,0],[3,1],[3,2]] */
export function parseRoute(raw: string): Position[] {
  return raw
    .split(";")
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map((pair): Position => {
      const parts = pair.split(",").map((s) => Number(s.trim()));
      if (parts.length !== 2 || !parts.every(Number.isInteger)) {
        throw new ConfigError(`Invalid route waypoint "${pair}"`);
      }
      return [parts[0], parts[1]];
    });
}

/**
 * 환경 변수 → 설정. 값은 trim, 빈 값은 기본값.
 * 잘못된 값은 ConfigError.
 */
export function loadConfig(env: Env): SimConfig {
  const strategyRaw = read(env, "STRATEGY") ?? DEFAULT_STRATEGY;
  if (!isStrategyName(strategyRaw)) {
    throw new ConfigError(`Unknown STRATEGY "${strategyRaw}"`);
  }

  const presetRaw = read(env, "TICK_PRESET") ?? "default";
  if (!isTickPresetName(presetRaw)) {
    throw new ConfigError(`Unknown TICK_PRESET "${presetRaw}"`);
  }

  const fallback = read(env, "FALLBACK") ?? DEFAULT_FALLBACK;
  if (fallback !== "random" && fallback !== "stay") {
    throw new ConfigError(`FALLBACK must be "random" or "stay", got "${fallback}"`);
  }

  const routeRaw = read(env, "PATROL_ROUTE");
  const route = routeRaw === undefined ? undefined : parseRoute(routeRaw);
  if (strategyRaw === "patrol" && (route === undefined || route.length === 0)) {
    throw new ConfigError("PATROL_ROUTE is required for the patrol strategy");
  }

  return {
    mapPath: read(env, "MAP_PATH") ?? DEFAULT_MAP_FILE,
    strategy: strategyRaw,
    tickMs: readInt(env, "TICK_MS", 1) ?? PRESETS[presetRaw].tickMs,
    maxTicks: readInt(env, "MAX_TICKS", 0) ?? DEFAULT_MAX_TICKS,
    agentCount: readInt(env, "AGENT_COUNT", 0),
    seed: read(env, "SEED"),
    fallback,
    route,
  };
}
