import { MAX_LOG_ENTRIES, MAX_SHUFFLE_ITERATIONS, TILE_TYPES } from "../shared/constants.js";
import type { BoardSnapshot, Coord } from "../shared/gameTypes.js";
import { createMatchGrid, createSeededRandom, applySwap, toBoardSnapshot } from "../shared/rules.js";
import type { ActionResult, SwapResult } from "../shared/rules.js";
import type { BoardRoom, BoardRoomOptions } from "./types.js";

export interface ParsedBoardRequest {
  success: boolean;
  error?: string;
  options?: BoardRoomOptions;
}

export function createBoardRoom(id: string, options: BoardRoomOptions = {}): BoardRoom {
  const rng = options.seed !== undefined ? createSeededRandom(options.seed) : Math.random;
  const { board, report } = createMatchGrid(
    {
      width: options.width,
      height: options.height,
      tileTypes: options.tileTypes,
      debug: options.debug,
      rng
    },
    options.maxShuffleIterations ?? MAX_SHUFFLE_ITERATIONS
  );
  const now = Date.now();
  const room: BoardRoom = {
    id,
    createdAt: now,
    updatedAt: now,
    options,
    board,
    report,
    swaps: 0,
    log: [],
    rng
  };
  addLogEntry(room, describeGeneration(room));
  return room;
}

export function regenerateRoomBoard(room: BoardRoom): ActionResult {
  const { board, report } = createMatchGrid(
    {
      width: room.board.width,
      height: room.board.height,
      tileTypes: room.board.tileTypes,
      debug: room.options.debug,
      rng: room.rng
    },
    room.options.maxShuffleIterations ?? MAX_SHUFFLE_ITERATIONS
  );
  room.board = board;
  room.report = report;
  room.swaps = 0;
  room.updatedAt = Date.now();
  addLogEntry(room, describeGeneration(room));
  return { success: true };
}

export function swapRoomTiles(room: BoardRoom, from: Coord, to: Coord): SwapResult {
  const result = applySwap(room.board, from, to);
  if (!result.success) return result;
  room.swaps += 1;
  room.updatedAt = Date.now();
  addLogEntry(room, `Swapped (${from.x}, ${from.y}) with (${to.x}, ${to.y}) ${result.axis}ly.`);
  return result;
}

export function toPublicBoard(room: BoardRoom): BoardSnapshot {
  return toBoardSnapshot(room);
}

export function addLogEntry(room: BoardRoom, message: string) {
  room.log.push(message);
  if (room.log.length > MAX_LOG_ENTRIES) {
    room.log.shift();
  }
}

export function parseBoardRequest(body: unknown): ParsedBoardRequest {
  if (body === undefined || body === null) return { success: true, options: {} };
  if (typeof body !== "object") {
    return { success: false, error: "Request body must be an object." };
  }
  const { width, height, tileKinds, seed }: Record<string, unknown> = Object.fromEntries(Object.entries(body));
  const options: BoardRoomOptions = {};

  for (const [key, value] of [
    ["width", width],
    ["height", height]
  ] as const) {
    if (value === undefined) continue;
    if (typeof value !== "number" || !Number.isInteger(value) || value < 3 || value > 16) {
      return { success: false, error: `${key} must be an integer between 3 and 16.` };
    }
    options[key] = value;
  }

  if (tileKinds !== undefined) {
    if (
      typeof tileKinds !== "number" ||
      !Number.isInteger(tileKinds) ||
      tileKinds < 2 ||
      tileKinds > TILE_TYPES.length
    ) {
      return { success: false, error: `tileKinds must be an integer between 2 and ${TILE_TYPES.length}.` };
    }
    options.tileTypes = TILE_TYPES.slice(0, tileKinds);
  }

  if (seed !== undefined) {
    if (typeof seed !== "number" || !Number.isFinite(seed)) {
      return { success: false, error: "seed must be a number." };
    }
    options.seed = seed;
  }

  return { success: true, options };
}

export function parseCoord(value: unknown): Coord | null {
  if (!value || typeof value !== "object") return null;
  const { x, y }: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  if (typeof x !== "number" || typeof y !== "number") return null;
  return { x, y };
}

function describeGeneration(room: BoardRoom): string {
  const { iterations, settled } = room.report;
  return settled
    ? `Generated ${room.board.width}x${room.board.height} board in ${iterations} shuffle pass(es).`
    : `Generated ${room.board.width}x${room.board.height} board; ${room.board.countLocalMatches()} matching cell(s) left after ${iterations} passes.`;
}
