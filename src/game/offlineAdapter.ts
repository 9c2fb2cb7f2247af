import { MAX_LOG_ENTRIES, MAX_SHUFFLE_ITERATIONS } from "../shared/constants.js";
import type { BoardSnapshot, Coord, TileType } from "../shared/gameTypes.js";
import type { RandomSource } from "../shared/random.js";
import { applySwap, createMatchGrid, createSeededRandom, toBoardSnapshot } from "../shared/rules.js";
import type { ActionResult, BoardGrid, ShuffleReport, SwapResult } from "../shared/rules.js";

export interface OfflineAdapterOptions {
  width?: number;
  height?: number;
  tileTypes?: readonly TileType[];
  maxShuffleIterations?: number;
  seed?: number;
  rng?: RandomSource;
}

export class OfflineAdapter {
  public readonly id = "local-board";
  private board: BoardGrid;
  private report: ShuffleReport;
  private swaps = 0;
  private updatedAt = Date.now();
  private log: string[] = [];
  private readonly rng: RandomSource;
  private readonly options: OfflineAdapterOptions;

  constructor(options: OfflineAdapterOptions = {}) {
    this.options = options;
    this.rng = options.rng ?? (options.seed !== undefined ? createSeededRandom(options.seed) : Math.random);
    const generated = this.generate();
    this.board = generated.board;
    this.report = generated.report;
  }

  public swap(from: Coord, to: Coord): SwapResult {
    const result = applySwap(this.board, from, to);
    if (result.success) {
      this.swaps += 1;
      this.touch(`Swapped (${from.x}, ${from.y}) with (${to.x}, ${to.y}).`);
    }
    return result;
  }

  public regenerate(): ActionResult {
    const generated = this.generate();
    this.board = generated.board;
    this.report = generated.report;
    this.swaps = 0;
    return { success: true };
  }

  public snapshot(): BoardSnapshot {
    return toBoardSnapshot({
      id: this.id,
      board: this.board,
      report: this.report,
      swaps: this.swaps,
      updatedAt: this.updatedAt,
      log: this.log
    });
  }

  public getBoard(): BoardGrid {
    return this.board;
  }

  private generate(): { board: BoardGrid; report: ShuffleReport } {
    const generated = createMatchGrid(
      {
        width: this.options.width,
        height: this.options.height,
        tileTypes: this.options.tileTypes,
        rng: this.rng
      },
      this.options.maxShuffleIterations ?? MAX_SHUFFLE_ITERATIONS
    );
    this.touch(`New board after ${generated.report.iterations} shuffle pass(es).`);
    return generated;
  }

  private touch(entry: string) {
    this.updatedAt = Date.now();
    this.log.push(entry);
    if (this.log.length > MAX_LOG_ENTRIES) {
      this.log.shift();
    }
  }
}
