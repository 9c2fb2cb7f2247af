import { describe, it, expect, vi, afterEach } from "vitest";
import { BoardConfigError, BoardGrid, createMatchGrid } from "../../src/shared/boardGrid.js";
import { TILE_TYPES } from "../../src/shared/constants.js";
import type { TileType } from "../../src/shared/gameTypes.js";
import { createSeededRandom } from "../../src/shared/random.js";

const settledRows = (): TileType[][] => [
  ["apple", "banana", "kiwi"],
  ["banana", "kiwi", "apple"],
  ["kiwi", "apple", "banana"]
];

// Walks the tile list in order, one kind per draw.
const cyclingRandom = () => {
  let calls = 0;
  const rng = () => {
    const value = ((calls % 6) + 0.5) / 6;
    calls += 1;
    return value;
  };
  return { rng, draws: () => calls };
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe("BoardGrid generation", () => {
  it("fills every cell of a solved grid with a matching tile", () => {
    for (const [width, height] of [
      [8, 8],
      [5, 5],
      [4, 7],
      [3, 3]
    ]) {
      const board = new BoardGrid({ width, height, rng: createSeededRandom(width * 31 + height) });
      expect(board.countLocalMatches()).toBe(width * height);
      expect(board.hasAnyLocalMatch()).toBe(true);
    }
  });

  it("lays runs rightward, then downward, then extends leftover cells from the left", () => {
    const { rng, draws } = cyclingRandom();
    const board = new BoardGrid({ width: 5, height: 5, rng });
    expect(board.format()).toBe("A A A P B\nO O O P B\nS S S P B\nK K K K K\nA A A A A");
    // Seven runs placed; the four copied cells draw nothing.
    expect(draws()).toBe(7);
  });

  it("only uses configured tile types", () => {
    const tileTypes: TileType[] = ["apple", "kiwi", "banana"];
    const { board } = createMatchGrid({ tileTypes, rng: createSeededRandom(5) });
    board.rows().forEach((row) => row.forEach((type) => expect(tileTypes).toContain(type)));
  });

  it("drops duplicate tile types", () => {
    const board = new BoardGrid({ tileTypes: ["apple", "apple", "kiwi"], rng: createSeededRandom(1) });
    expect(board.tileTypes).toEqual(["apple", "kiwi"]);
  });

  it("resets the shuffle report when regenerating", () => {
    const board = new BoardGrid({ rng: createSeededRandom(2) });
    board.shuffle();
    board.generateSolvedGrid();
    expect(board.lastShuffleReport).toEqual({ iterations: 0, settled: false });
    expect(board.countLocalMatches()).toBe(64);
  });
});

describe("BoardGrid shuffle", () => {
  it("keeps the tile multiset and stays within the iteration cap", () => {
    const board = new BoardGrid({ rng: createSeededRandom(3) });
    const before = board.tileCounts();
    const report = board.shuffle();
    expect(board.tileCounts()).toEqual(before);
    expect(report.iterations).toBeGreaterThanOrEqual(1);
    expect(report.iterations).toBeLessThanOrEqual(200);
    expect(report.settled).toBe(!board.hasAnyLocalMatch());
    expect(board.lastShuffleReport).toEqual(report);
  });

  it("runs one pass on a board that has no matches", () => {
    const board = BoardGrid.fromRows(settledRows());
    expect(board.hasAnyLocalMatch()).toBe(false);
    expect(board.shuffle()).toEqual({ iterations: 1, settled: true });
    expect(board.rows()).toEqual(settledRows());
  });

  it("stops at the cap when a single tile type can never settle", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const { board, report } = createMatchGrid(
      { width: 4, height: 4, tileTypes: ["kiwi"], rng: createSeededRandom(4) },
      5
    );
    expect(report).toEqual({ iterations: 5, settled: false });
    expect(board.countLocalMatches()).toBe(16);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("falls back to the first different tile in row order once retries run out", () => {
    const { rng, draws } = cyclingRandom();
    const board = BoardGrid.fromRows(
      [
        ["kiwi", "kiwi", "kiwi"],
        ["apple", "apple", "kiwi"],
        ["apple", "kiwi", "apple"]
      ],
      { tileTypes: ["apple", "kiwi"], maxResampleAttempts: 0, rng }
    );
    expect(board.shuffle(5)).toEqual({ iterations: 1, settled: true });
    expect(board.rows()).toEqual([
      ["apple", "kiwi", "kiwi"],
      ["kiwi", "apple", "kiwi"],
      ["apple", "kiwi", "apple"]
    ]);
    expect(board.tileCounts()).toEqual({ apple: 4, kiwi: 5 });
    expect(draws()).toBe(0);
  });

  it("is deterministic for a given seed", () => {
    const first = createMatchGrid({ rng: createSeededRandom(42) });
    const second = createMatchGrid({ rng: createSeededRandom(42) });
    expect(second.board.rows()).toEqual(first.board.rows());
    expect(second.report).toEqual(first.report);
  });
});

describe("BoardGrid validation", () => {
  it("rejects boards too small for a run", () => {
    expect(() => new BoardGrid({ width: 2, height: 8 })).toThrow(BoardConfigError);
  });

  it("rejects non-integer dimensions", () => {
    expect(() => new BoardGrid({ width: 7.5 })).toThrow("Board dimensions must be integers, got 7.5x8.");
  });

  it("rejects an empty tile set", () => {
    expect(() => new BoardGrid({ tileTypes: [] })).toThrow("At least one tile type is required.");
  });

  it("rejects ragged rows", () => {
    expect(() =>
      BoardGrid.fromRows([
        ["apple", "kiwi", "banana"],
        ["apple", "kiwi"],
        ["apple", "kiwi", "banana"]
      ])
    ).toThrow("All rows must have the same length.");
  });

  it("throws RangeError outside the board", () => {
    const board = BoardGrid.fromRows(settledRows());
    expect(() => board.tileAt({ x: 3, y: 0 })).toThrow(RangeError);
    expect(() => board.swap({ x: -1, y: 0 }, { x: 0, y: 0 })).toThrow(RangeError);
    expect(board.inBounds({ x: 0.5, y: 0 })).toBe(false);
    expect(board.inBounds({ x: 2, y: 2 })).toBe(true);
  });
});

describe("BoardGrid.fromRows", () => {
  it("adopts the rows without generating a grid first", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const { rng, draws } = cyclingRandom();
    const board = BoardGrid.fromRows(settledRows(), { rng, debug: true });
    expect(board.rows()).toEqual(settledRows());
    expect(draws()).toBe(0);
    expect(debug).not.toHaveBeenCalled();
  });
});

describe("BoardGrid local matches", () => {
  it("counts same-type cells within two steps, gaps included", () => {
    const board = BoardGrid.fromRows([
      ["apple", "banana", "apple", "kiwi", "apple"],
      ["kiwi", "orange", "banana", "orange", "kiwi"],
      ["banana", "kiwi", "orange", "banana", "orange"],
      ["orange", "apple", "kiwi", "apple", "banana"],
      ["kiwi", "banana", "apple", "kiwi", "orange"]
    ]);
    expect(board.hasLocalMatch(2, 0)).toBe(true);
    expect(board.hasLocalMatch(0, 0)).toBe(false);
    expect(board.hasLocalMatch(1, 4)).toBe(false);
  });

  it("detects vertical matches", () => {
    const board = BoardGrid.fromRows([
      ["apple", "banana", "kiwi"],
      ["apple", "kiwi", "banana"],
      ["apple", "banana", "kiwi"]
    ]);
    expect(board.hasLocalMatch(0, 1)).toBe(true);
    expect(board.hasLocalMatch(1, 1)).toBe(false);
    expect(board.hasLocalMatch(1, 0)).toBe(false);
  });
});

describe("BoardGrid access", () => {
  it("swaps two cells", () => {
    const board = BoardGrid.fromRows(settledRows());
    board.swap({ x: 0, y: 0 }, { x: 1, y: 0 });
    expect(board.rows()[0]).toEqual(["banana", "apple", "kiwi"]);
    expect(board.tileAt({ x: 1, y: 0 })).toBe("apple");
  });

  it("hands out copies of its rows", () => {
    const board = BoardGrid.fromRows(settledRows());
    const rows = board.rows();
    rows[0][0] = "orange";
    expect(board.tileAt({ x: 0, y: 0 })).toBe("apple");
  });

  it("counts tiles per type", () => {
    const board = BoardGrid.fromRows(settledRows());
    expect(board.tileCounts()).toEqual({ apple: 3, banana: 3, kiwi: 3 });
  });

  it("formats rows by initial", () => {
    const board = BoardGrid.fromRows(settledRows());
    expect(board.format()).toBe("A B K\nB K A\nK A B");
  });

  it("ships six tile kinds by default", () => {
    expect(new BoardGrid({ rng: createSeededRandom(8) }).tileTypes).toEqual(TILE_TYPES);
  });
});
