import type { Position } from "../grid/mapGrid.js";

/** 틱 결과 분류 */
export enum MoveOutcome {
  MOVED = "MOVED",
  STAYED = "STAYED",
  /** 최단 경로 실패 → fallback 정책 적용 */
  FALLBACK = "FALLBACK",
}

/** 시뮬레이션용 에이전트 상태 (위치 + 순찰 경로 인덱스) */
export type AgentState = {
  pos: Position;
  /** patrol 전략에서만 사용 */
  routeIndex?: number;
};
