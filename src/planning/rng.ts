import seedrandom from "seedrandom";
import type { Rng } from "./types.js";

/** 시드가 있으면 재현 가능한 난수열, 없으면 자동 시드 */
export function createRng(seed?: string): Rng {
  const prng = seed === undefined ? seedrandom() : seedrandom(seed);
  return () => prng();
}
