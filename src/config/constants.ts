// 시뮬레이션/앱 공용 상수

import type { StrategyName } from "../planning/types.js";
import type { FallbackPolicy } from "../sim/simulate.js";

// 렌더링: 에이전트 표시 문자
export const AGENT_SYMBOL = "*";

// 1틱 = 1000ms (터미널 데모 기본값)
export const DEFAULT_TICK_MS = 1000;
// 0이면 종료 신호(SIGINT)까지 계속
export const DEFAULT_MAX_TICKS = 0;
export const DEFAULT_STRATEGY: StrategyName = "shortest-path";
export const DEFAULT_FALLBACK: FallbackPolicy = "random";
// 이 값 그대로면 패키지에 포함된 맵, 다른 상대 경로는 cwd 기준 (index.ts)
export const DEFAULT_MAP_FILE = "maps/default.txt";
