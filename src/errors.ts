import type { Position } from "./grid/mapGrid.js";

export type SimulationErrorCode =
  | "INVALID_MAP_CHARACTER"
  | "EMPTY_MAP"
  | "OUT_OF_BOUNDS"
  | "NO_REACHABLE_DESTINATION"
  | "INVALID_AGENT_POSITION"
  | "INVALID_ROUTE"
  | "CONFIG";

/** 시뮬레이션 코어/앱 공통 에러. `code`로 종류를 구분한다. */
export class SimulationError extends Error {
  readonly code: SimulationErrorCode;

  constructor(code: SimulationErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = new.target.name;
  }
}

const fmt = ([x, y]: Position) => `(${x}, ${y})`;

/** 맵 텍스트에 알 수 없는 문자가 있음 (생성 시점, 치명적) */
export class InvalidMapCharacterError extends SimulationError {
  readonly char: string;
  readonly pos: Position;

  constructor(char: string, pos: Position) {
    super(
      "INVALID_MAP_CHARACTER",
      `Invalid map character ${JSON.stringify(char)} at ${fmt(pos)}`,
    );
    this.char = char;
    this.pos = pos;
  }
}

export class EmptyMapError extends SimulationError {
  constructor() {
    super("EMPTY_MAP", "Map description has no non-empty lines");
  }
}

export class OutOfBoundsError extends SimulationError {
  readonly pos: Position;

  constructor(pos: Position, width: number, height: number) {
    super(
      "OUT_OF_BOUNDS",
      `Position ${fmt(pos)} is outside the ${width}x${height} grid`,
    );
    this.pos = pos;
  }
}

/** BFS 프런티어 소진: 도착지 칸에 닿을 수 없음 (틱 단위로 복구 가능) */
export class NoReachableDestinationError extends SimulationError {
  readonly from: Position;

  constructor(from: Position) {
    super(
      "NO_REACHABLE_DESTINATION",
      `No destination is reachable from ${fmt(from)}`,
    );
    this.from = from;
  }
}

export class InvalidAgentPositionError extends SimulationError {
  readonly pos: Position;

  constructor(pos: Position, reason: string) {
    super("INVALID_AGENT_POSITION", `Agent at ${fmt(pos)}: ${reason}`);
    this.pos = pos;
  }
}

export class InvalidRouteError extends SimulationError {
  constructor(reason: string) {
    super("INVALID_ROUTE", `Invalid patrol route: ${reason}`);
  }
}

export class ConfigError extends SimulationError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}
