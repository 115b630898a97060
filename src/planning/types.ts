import type { Grid, Position } from "../grid/mapGrid.js";
import type { AgentState } from "../domain/agent.js";

/** [0, 1) 균등 난수. 테스트에서는 시드 고정 또는 스크립트 값 주입 */
export type Rng = () => number;

export type StrategyName = "random" | "shortest-path" | "patrol";

export type MoveContext = {
  grid: Grid;
  agent: Readonly<AgentState>;
};

/** 이동 전략: 한 틱에 에이전트 하나의 다음 상태를 정한다 */
export interface MoveStrategy {
  readonly name: StrategyName;
  /** 시뮬레이션 생성 시 초기 상태 준비 (없으면 위치만 사용) */
  initAgent?(grid: Grid, pos: Position): AgentState;
  nextState(ctx: MoveContext): AgentState;
}
