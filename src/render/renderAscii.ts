import { inBounds, type Grid, type Position } from "../grid/mapGrid.js";
import { CHAR_BY_TERRAIN } from "../grid/terrain.js";
import { AGENT_SYMBOL } from "../config/constants.js";

/**
 * 그리드 + 에이전트를 텍스트 프레임으로.
 * 줄마다 폭 w 유지 (끝 공백 포함), 에이전트는 지형 위에 덮어 그린다.
 */
export function renderFrame(grid: Grid, agents: readonly Position[]): string {
  const canvas = grid.cells.map((row) =>
    row.map((cell) => CHAR_BY_TERRAIN[cell]),
  );
  for (const pos of agents) {
    if (!inBounds(grid, pos)) continue;
    canvas[pos[1]][pos[0]] = AGENT_SYMBOL;
  }
  return canvas.map((row) => row.join("")).join("\n");
}
