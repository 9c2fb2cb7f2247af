import { describe, it, expect, vi, afterEach } from "vitest";
import {
  addLogEntry,
  createBoardRoom,
  parseBoardRequest,
  parseCoord,
  regenerateRoomBoard,
  swapRoomTiles,
  toPublicBoard
} from "../../src/server/boardState.js";

// Seed 7 settles on its first shuffle pass; seed 11 deals mostly oranges and never does.
const makeRoom = () => createBoardRoom("ROOM1", { width: 5, height: 4, seed: 7 });

afterEach(() => {
  vi.restoreAllMocks();
});

describe("board rooms", () => {
  it("creates a board with the requested size", () => {
    const room = makeRoom();
    const board = toPublicBoard(room);
    expect(board.id).toBe("ROOM1");
    expect(board.width).toBe(5);
    expect(board.height).toBe(4);
    expect(board.rows).toHaveLength(4);
    board.rows.forEach((row) => expect(row).toHaveLength(5));
    expect(board.swaps).toBe(0);
    expect(board.settled).toBe(!room.board.hasAnyLocalMatch());
    expect(board.settled).toBe(true);
    expect(board.log).toEqual(["Generated 5x4 board in 1 shuffle pass(es)."]);
  });

  it("logs the matches left when the shuffle hits its cap", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const room = createBoardRoom("ROOM2", { width: 5, height: 4, seed: 11 });
    expect(room.report).toEqual({ iterations: 200, settled: false });
    expect(room.log).toEqual(["Generated 5x4 board; 16 matching cell(s) left after 200 passes."]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("produces the same board for the same seed", () => {
    expect(makeRoom().board.rows()).toEqual(makeRoom().board.rows());
  });

  it("swaps neighbouring tiles and records them", () => {
    const room = makeRoom();
    const before = room.board.rows();
    expect(swapRoomTiles(room, { x: 0, y: 0 }, { x: 1, y: 0 })).toEqual({ success: true, axis: "horizontal" });
    expect(swapRoomTiles(room, { x: 2, y: 1 }, { x: 2, y: 2 })).toEqual({ success: true, axis: "vertical" });

    const after = room.board.rows();
    expect(after[0][0]).toBe(before[0][1]);
    expect(after[0][1]).toBe(before[0][0]);
    expect(after[1][2]).toBe(before[2][2]);
    expect(after[2][2]).toBe(before[1][2]);
    expect(room.swaps).toBe(2);
    expect(room.log.slice(1)).toEqual([
      "Swapped (0, 0) with (1, 0) horizontally.",
      "Swapped (2, 1) with (2, 2) vertically."
    ]);
  });

  it("rejects swaps that are not orthogonal neighbours", () => {
    const room = makeRoom();
    const before = room.board.rows();
    expect(swapRoomTiles(room, { x: 0, y: 0 }, { x: 1, y: 1 })).toEqual({
      success: false,
      error: "Tiles must be horizontal or vertical neighbours."
    });
    expect(swapRoomTiles(room, { x: 4, y: 0 }, { x: 5, y: 0 })).toEqual({
      success: false,
      error: "Tile is outside the board."
    });
    expect(room.board.rows()).toEqual(before);
    expect(room.swaps).toBe(0);
  });

  it("regenerates the board and resets the swap count", () => {
    const room = makeRoom();
    swapRoomTiles(room, { x: 0, y: 0 }, { x: 1, y: 0 });
    expect(regenerateRoomBoard(room)).toEqual({ success: true });
    expect(room.swaps).toBe(0);
    expect(room.board.width).toBe(5);
    expect(room.board.height).toBe(4);
    expect(room.log).toHaveLength(3);
    expect(room.log[2]).toBe("Generated 5x4 board in 1 shuffle pass(es).");
  });

  it("keeps only the latest log entries", () => {
    const room = makeRoom();
    for (let i = 0; i < 60; i += 1) {
      addLogEntry(room, `entry ${i}`);
    }
    expect(room.log).toHaveLength(50);
    expect(room.log[0]).toBe("entry 10");
    expect(room.log[49]).toBe("entry 59");
  });

  it("hands out snapshots that do not alias the room", () => {
    const room = makeRoom();
    const board = toPublicBoard(room);
    board.rows[0][0] = board.rows[0][0] === "apple" ? "kiwi" : "apple";
    board.log?.push("extra");
    expect(room.board.rows()[0][0]).not.toBe(board.rows[0][0]);
    expect(room.log).toHaveLength(1);
  });
});

describe("parseBoardRequest", () => {
  it("accepts an empty body", () => {
    expect(parseBoardRequest(undefined)).toEqual({ success: true, options: {} });
    expect(parseBoardRequest({})).toEqual({ success: true, options: {} });
  });

  it("reads size, tile kinds and seed", () => {
    expect(parseBoardRequest({ width: 6, height: 9, tileKinds: 3, seed: 5 })).toEqual({
      success: true,
      options: { width: 6, height: 9, tileTypes: ["apple", "pineapple", "banana"], seed: 5 }
    });
  });

  it("rejects invalid values", () => {
    expect(parseBoardRequest("big")).toEqual({ success: false, error: "Request body must be an object." });
    expect(parseBoardRequest({ width: 2 })).toEqual({
      success: false,
      error: "width must be an integer between 3 and 16."
    });
    expect(parseBoardRequest({ height: 4.5 })).toEqual({
      success: false,
      error: "height must be an integer between 3 and 16."
    });
    expect(parseBoardRequest({ tileKinds: 7 })).toEqual({
      success: false,
      error: "tileKinds must be an integer between 2 and 6."
    });
    expect(parseBoardRequest({ seed: "abc" })).toEqual({ success: false, error: "seed must be a number." });
  });
});

describe("parseCoord", () => {
  it("returns numeric coordinates only", () => {
    expect(parseCoord({ x: 1, y: 2 })).toEqual({ x: 1, y: 2 });
    expect(parseCoord({ x: "1", y: 2 })).toBeNull();
    expect(parseCoord(null)).toBeNull();
  });
});
