import { DEFAULT_TICK_MS } from "./constants.js";

/**
 * 틱 속도 프리셋.
 * TICK_PRESET 환경 변수로 선택, TICK_MS가 있으면 그 값이 우선.
 */
export type TickPresetName = "default" | "fast" | "slow";

export type TickPreset = {
  tickMs: number;
};

export const PRESET_DEFAULT: TickPreset = { tickMs: DEFAULT_TICK_MS };

/** 짧게: 경로 추적 확인용 */
export const PRESET_FAST: TickPreset = { tickMs: 150 };

export const PRESET_SLOW: TickPreset = { tickMs: 2500 };

export const PRESETS: Record<TickPresetName, TickPreset> = {
  default: PRESET_DEFAULT,
  fast: PRESET_FAST,
  slow: PRESET_SLOW,
};

export function isTickPresetName(value: string): value is TickPresetName {
  return Object.prototype.hasOwnProperty.call(PRESETS, value);
}
