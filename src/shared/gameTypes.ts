export type TileType =
  | "apple"
  | "pineapple"
  | "banana"
  | "orange"
  | "strawberry"
  | "kiwi";

export interface Coord {
  x: number;
  y: number;
}

export type SwapAxis = "horizontal" | "vertical" | "invalid";

export interface BoardSnapshot {
  id: string;
  width: number;
  height: number;
  // rows[y][x]
  rows: TileType[][];
  shuffleIterations: number;
  settled: boolean;
  swaps: number;
  updatedAt: number;
  log?: string[];
}
