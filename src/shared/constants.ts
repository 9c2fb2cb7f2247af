import type { TileType } from "./gameTypes.js";

export const TILE_TYPES: readonly TileType[] = [
  "apple",
  "pineapple",
  "banana",
  "orange",
  "strawberry",
  "kiwi"
];

export const GRID_WIDTH = 8;
export const GRID_HEIGHT = 8;

// Minimum number of same-type neighbors (per axis, within the window) that
// makes a cell count as matching. Generation lays runs of MIN_NEIGHBORS + 1.
export const MIN_NEIGHBORS = 2;

export const MAX_SHUFFLE_ITERATIONS = 200;
export const MAX_RESAMPLE_ATTEMPTS = 64;

// Seconds.
export const SWAP_DURATION = 0.5;

// World units; tiles sit one unit apart.
export const NEIGHBOR_DISTANCE = 1.5;
export const SELF_DISTANCE = 0.5;

export const MAX_LOG_ENTRIES = 50;
