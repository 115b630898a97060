import { inBounds, type Grid, type Position } from "./mapGrid.js";

export type Offset = readonly [number, number];

/** 하, 우, 좌, 상. 이 순서가 BFS 동점 처리 기준 */
export const DIRS4: readonly Offset[] = [
  [0, 1],
  [1, 0],
  [-1, 0],
  [0, -1],
];

/** 4방향 + 대각선. 최단 경로 탐색에는 쓰지 않음 */
export const DIRS8: readonly Offset[] = [
  ...DIRS4,
  [1, 1],
  [-1, 1],
  [1, -1],
  [-1, -1],
];

/**
 * 그리드 안에 있는 인접 칸을 offsets 순서대로 생성.
 * 호출할 때마다 새로 계산한다.
 */
export function* neighbors(
  grid: Grid,
  [x, y]: Position,
  offsets: readonly Offset[] = DIRS4,
): Generator<Position, void, undefined> {
  for (const [dx, dy] of offsets) {
    const next: Position = [x + dx, y + dy];
    if (inBounds(grid, next)) yield next;
  }
}
