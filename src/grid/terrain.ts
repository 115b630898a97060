/** 칸 지형 종류 */
export enum Terrain {
  Empty = "Empty",
  Wall = "Wall",
  /** 통과 가능, 에이전트 출발 지점 표시용 */
  SpawnPoint = "SpawnPoint",
  /** 통과 가능, 최단 경로 탐색의 목표 */
  Destination = "Destination",
}

export const TERRAIN_BY_CHAR: ReadonlyMap<string, Terrain> = new Map([
  [" ", Terrain.Empty],
  ["#", Terrain.Wall],
  ["^", Terrain.SpawnPoint],
  ["$", Terrain.Destination],
]);

export const CHAR_BY_TERRAIN: Readonly<Record<Terrain, string>> = {
  [Terrain.Empty]: " ",
  [Terrain.Wall]: "#",
  [Terrain.SpawnPoint]: "^",
  [Terrain.Destination]: "$",
};
