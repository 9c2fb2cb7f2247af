import type { BoardGrid, ShuffleReport } from "../shared/boardGrid.js";
import type { TileType } from "../shared/gameTypes.js";
import type { RandomSource } from "../shared/random.js";

export interface BoardRoomOptions {
  width?: number;
  height?: number;
  tileTypes?: readonly TileType[];
  seed?: number;
  maxShuffleIterations?: number;
  debug?: boolean;
}

export interface BoardRoom {
  id: string;
  createdAt: number;
  updatedAt: number;
  options: BoardRoomOptions;
  board: BoardGrid;
  report: ShuffleReport;
  swaps: number;
  log: string[];
  rng: RandomSource;
}
