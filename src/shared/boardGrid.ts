import {
  GRID_HEIGHT,
  GRID_WIDTH,
  MAX_RESAMPLE_ATTEMPTS,
  MAX_SHUFFLE_ITERATIONS,
  MIN_NEIGHBORS,
  TILE_TYPES
} from "./constants.js";
import type { Coord, TileType } from "./gameTypes.js";
import { randomInt, type RandomSource } from "./random.js";

export interface BoardGridOptions {
  width?: number;
  height?: number;
  minNeighbors?: number;
  tileTypes?: readonly TileType[];
  rng?: RandomSource;
  maxResampleAttempts?: number;
  debug?: boolean;
}

export interface ShuffleReport {
  iterations: number;
  settled: boolean;
}

export class BoardConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BoardConfigError";
  }
}

type DraftCell = TileType | null;

export class BoardGrid {
  public readonly width: number;
  public readonly height: number;
  public readonly minNeighbors: number;
  public readonly tileTypes: readonly TileType[];

  private readonly rng: RandomSource;
  private readonly maxResampleAttempts: number;
  private readonly debug: boolean;
  private grid: TileType[][];
  private lastShuffle: ShuffleReport = { iterations: 0, settled: false };

  /**
   * Builds a solved grid, or adopts `rows` as they are when given (no draws
   * from `rng`).
   */
  constructor(options: BoardGridOptions = {}, rows?: TileType[][]) {
    this.width = options.width ?? GRID_WIDTH;
    this.height = options.height ?? GRID_HEIGHT;
    this.minNeighbors = options.minNeighbors ?? MIN_NEIGHBORS;
    this.tileTypes = [...new Set(options.tileTypes ?? TILE_TYPES)];
    this.rng = options.rng ?? Math.random;
    this.maxResampleAttempts = Math.max(0, options.maxResampleAttempts ?? MAX_RESAMPLE_ATTEMPTS);
    this.debug = options.debug ?? false;
    validateDimensions(this.width, this.height, this.minNeighbors, this.tileTypes);
    this.grid = rows ? this.adoptRows(rows) : this.buildSolvedRows();
  }

  public static fromRows(rows: TileType[][], options: Omit<BoardGridOptions, "width" | "height"> = {}) {
    const height = rows.length;
    const width = rows[0]?.length ?? 0;
    if (rows.some((row) => row.length !== width)) {
      throw new BoardConfigError("All rows must have the same length.");
    }
    return new BoardGrid({ ...options, width, height }, rows);
  }

  public get lastShuffleReport(): ShuffleReport {
    return { ...this.lastShuffle };
  }

  /**
   * Refills the whole board with runs of identical tiles, so every cell
   * starts out matching. Shuffling is what breaks the runs up.
   */
  public generateSolvedGrid(): this {
    this.grid = this.buildSolvedRows();
    this.lastShuffle = { iterations: 0, settled: false };
    return this;
  }

  /**
   * Best effort: may stop at the iteration cap with matches left on the board.
   */
  public shuffle(maxIterations = MAX_SHUFFLE_ITERATIONS): ShuffleReport {
    let iterations = 0;
    do {
      for (let y = 0; y < this.height; y += 1) {
        for (let x = 0; x < this.width; x += 1) {
          if (!this.hasLocalMatch(x, y)) continue;
          const partner = this.pickDifferentCell(x, y);
          if (partner) {
            this.swap({ x, y }, partner);
          }
        }
      }
      iterations += 1;
    } while (this.hasAnyLocalMatch() && iterations < maxIterations);

    const settled = !this.hasAnyLocalMatch();
    this.lastShuffle = { iterations, settled };
    if (this.debug) {
      console.debug(`[board] shuffled in ${iterations} iteration(s), settled=${settled}\n${this.format()}`);
    }
    return { iterations, settled };
  }

  public hasLocalMatch(x: number, y: number): boolean {
    const type = this.tileAt({ x, y });
    const reach = this.minNeighbors;

    let horizontal = 0;
    for (let i = -reach; i <= reach; i += 1) {
      const nx = x + i;
      if (i !== 0 && nx >= 0 && nx < this.width && this.grid[y][nx] === type) {
        horizontal += 1;
      }
    }
    if (horizontal >= this.minNeighbors) return true;

    let vertical = 0;
    for (let i = -reach; i <= reach; i += 1) {
      const ny = y + i;
      if (i !== 0 && ny >= 0 && ny < this.height && this.grid[ny][x] === type) {
        vertical += 1;
      }
    }
    return vertical >= this.minNeighbors;
  }

  public hasAnyLocalMatch(): boolean {
    for (let y = 0; y < this.height; y += 1) {
      for (let x = 0; x < this.width; x += 1) {
        if (this.hasLocalMatch(x, y)) return true;
      }
    }
    return false;
  }

  public countLocalMatches(): number {
    let count = 0;
    for (let y = 0; y < this.height; y += 1) {
      for (let x = 0; x < this.width; x += 1) {
        if (this.hasLocalMatch(x, y)) count += 1;
      }
    }
    return count;
  }

  public tileAt(coord: Coord): TileType {
    this.assertInBounds(coord);
    return this.grid[coord.y][coord.x];
  }

  public swap(a: Coord, b: Coord): void {
    this.assertInBounds(a);
    this.assertInBounds(b);
    const temp = this.grid[a.y][a.x];
    this.grid[a.y][a.x] = this.grid[b.y][b.x];
    this.grid[b.y][b.x] = temp;
  }

  public inBounds(coord: Coord): boolean {
    return (
      Number.isInteger(coord.x) &&
      Number.isInteger(coord.y) &&
      coord.x >= 0 &&
      coord.x < this.width &&
      coord.y >= 0 &&
      coord.y < this.height
    );
  }

  public rows(): TileType[][] {
    return this.grid.map((row) => [...row]);
  }

  public tileCounts(): Partial<Record<TileType, number>> {
    const counts: Partial<Record<TileType, number>> = {};
    this.grid.forEach((row) => {
      row.forEach((type) => {
        counts[type] = (counts[type] ?? 0) + 1;
      });
    });
    return counts;
  }

  // First letter of each tile, one row per line.
  public format(): string {
    return formatRows(this.grid);
  }

  private buildSolvedRows(): TileType[][] {
    const draft: DraftCell[][] = Array.from({ length: this.height }, () =>
      Array.from({ length: this.width }, (): DraftCell => null)
    );
    const span = this.minNeighbors;

    for (let y = 0; y < this.height; y += 1) {
      for (let x = 0; x < this.width; x += 1) {
        if (draft[y][x] !== null) continue;

        if (x + span < this.width) {
          const type = this.randomType();
          for (let i = 0; i <= span; i += 1) {
            draft[y][x + i] = type;
          }
        } else if (y + span < this.height) {
          const type = this.randomType();
          for (let i = 0; i <= span; i += 1) {
            draft[y + i][x] = type;
          }
        } else if (x - span >= 0) {
          draft[y][x] = draft[y][x - 1];
        } else {
          throw new Error(`No fill direction available at (${x}, ${y}) while generating grid.`);
        }
      }
    }

    const rows = draft.map((row, y) =>
      row.map((cell, x) => {
        if (cell === null) {
          throw new Error(`Cell (${x}, ${y}) left unassigned after generation.`);
        }
        return cell;
      })
    );
    if (this.debug) {
      console.debug(`[board] solved grid ${this.width}x${this.height}\n${formatRows(rows)}`);
    }
    return rows;
  }

  private adoptRows(rows: TileType[][]): TileType[][] {
    if (rows.length !== this.height || rows.some((row) => row.length !== this.width)) {
      throw new BoardConfigError(`Rows do not match the ${this.width}x${this.height} board.`);
    }
    const allowed = new Set(this.tileTypes);
    rows.forEach((row, y) =>
      row.forEach((type, x) => {
        if (!allowed.has(type)) {
          throw new BoardConfigError(`Unknown tile type "${type}" at (${x}, ${y}).`);
        }
      })
    );
    return rows.map((row) => [...row]);
  }

  private pickDifferentCell(x: number, y: number): Coord | null {
    const type = this.grid[y][x];
    for (let attempt = 0; attempt < this.maxResampleAttempts; attempt += 1) {
      const rx = randomInt(this.rng, this.width);
      const ry = randomInt(this.rng, this.height);
      if (this.grid[ry][rx] !== type) {
        return { x: rx, y: ry };
      }
    }

    for (let ry = 0; ry < this.height; ry += 1) {
      for (let rx = 0; rx < this.width; rx += 1) {
        if (this.grid[ry][rx] !== type) {
          return { x: rx, y: ry };
        }
      }
    }
    return null;
  }

  private randomType(): TileType {
    return this.tileTypes[randomInt(this.rng, this.tileTypes.length)];
  }

  private assertInBounds(coord: Coord) {
    if (!this.inBounds(coord)) {
      throw new RangeError(`(${coord.x}, ${coord.y}) is outside the ${this.width}x${this.height} board.`);
    }
  }
}

/**
 * Solved fill followed by the bounded shuffle. This is how every playable
 * board gets made.
 */
export function createMatchGrid(
  options: BoardGridOptions = {},
  maxIterations = MAX_SHUFFLE_ITERATIONS
): { board: BoardGrid; report: ShuffleReport } {
  const board = new BoardGrid(options);
  const report = board.shuffle(maxIterations);
  if (!report.settled) {
    console.warn(
      `[board] shuffle stopped after ${report.iterations} iterations with ${board.countLocalMatches()} matching cell(s)`
    );
  }
  return { board, report };
}

function validateDimensions(
  width: number,
  height: number,
  minNeighbors: number,
  tileTypes: readonly TileType[]
) {
  if (!Number.isInteger(minNeighbors) || minNeighbors < 1) {
    throw new BoardConfigError(`minNeighbors must be a positive integer, got ${minNeighbors}.`);
  }
  if (!Number.isInteger(width) || !Number.isInteger(height)) {
    throw new BoardConfigError(`Board dimensions must be integers, got ${width}x${height}.`);
  }
  const runLength = minNeighbors + 1;
  if (Math.min(width, height) < runLength) {
    throw new BoardConfigError(
      `Board must be at least ${runLength}x${runLength} for runs of ${runLength}, got ${width}x${height}.`
    );
  }
  if (!tileTypes.length) {
    throw new BoardConfigError("At least one tile type is required.");
  }
}

function formatRows(rows: TileType[][]): string {
  return rows.map((row) => row.map((type) => type.charAt(0).toUpperCase()).join(" ")).join("\n");
}
