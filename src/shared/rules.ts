// Shared rules facade.
// Offline play and the server both go through this module so they agree on how
// boards are generated and which swaps are allowed.

import type { BoardGrid, ShuffleReport } from "./boardGrid.js";
import type { BoardSnapshot, Coord, SwapAxis } from "./gameTypes.js";
import { classifySwap } from "./selection.js";

export { BoardGrid, BoardConfigError, createMatchGrid } from "./boardGrid.js";
export type { BoardGridOptions, ShuffleReport } from "./boardGrid.js";
export { classifySwap, interpolateSwap, lerpPosition, SelectionController } from "./selection.js";
export { createSeededRandom } from "./random.js";

export interface ActionResult {
  success: boolean;
  error?: string;
}

export interface SwapResult extends ActionResult {
  axis?: Exclude<SwapAxis, "invalid">;
}

/**
 * Applies a swap requested in board coordinates, where neighbouring cells sit
 * one unit apart. The swap is not checked for the matches it creates.
 */
export function applySwap(board: BoardGrid, from: Coord, to: Coord): SwapResult {
  if (!board.inBounds(from) || !board.inBounds(to)) {
    return { success: false, error: "Tile is outside the board." };
  }
  const axis = classifySwap(from, to);
  if (axis === "invalid") {
    return { success: false, error: "Tiles must be horizontal or vertical neighbours." };
  }
  board.swap(from, to);
  return { success: true, axis };
}

export interface SnapshotSource {
  id: string;
  board: BoardGrid;
  report: ShuffleReport;
  swaps: number;
  updatedAt: number;
  log: string[];
}

export function toBoardSnapshot(source: SnapshotSource): BoardSnapshot {
  return {
    id: source.id,
    width: source.board.width,
    height: source.board.height,
    rows: source.board.rows(),
    shuffleIterations: source.report.iterations,
    settled: source.report.settled,
    swaps: source.swaps,
    updatedAt: source.updatedAt,
    log: [...source.log]
  };
}
