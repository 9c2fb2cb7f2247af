import { NEIGHBOR_DISTANCE, SELF_DISTANCE, SWAP_DURATION } from "./constants.js";
import type { Coord, SwapAxis } from "./gameTypes.js";

export interface WorldPosition {
  x: number;
  y: number;
  z: number;
}

export interface ScreenPoint {
  x: number;
  y: number;
}

export interface PickedTile {
  coord: Coord;
  position: WorldPosition;
}

export interface PointerInput {
  position?: ScreenPoint;
}

export interface TileResolver {
  pickTile(point: ScreenPoint): PickedTile | null;
}

export interface SelectionSink {
  setHighlighted(coord: Coord, highlighted: boolean): void;
  setPosition(coord: Coord, position: WorldPosition): void;
  // Hands board-coordinate ownership of the two visuals over to each other.
  swapTiles(a: Coord, b: Coord): void;
}

export interface SwapTarget {
  swap(a: Coord, b: Coord): void;
}

export type SwapMode = "instant" | "animated";

export interface SwapOperation {
  origin: PickedTile;
  target: PickedTile;
  axis: Exclude<SwapAxis, "invalid">;
  startedAt: number;
  elapsed: number;
  duration: number;
}

export type SelectionState =
  | { kind: "idle" }
  | { kind: "selected"; tile: PickedTile }
  | { kind: "swapping"; swap: SwapOperation };

export type SelectionTransition =
  | { kind: "ignored"; reason: "busy" | "no-position" | "no-tile" }
  | { kind: "unchanged"; coord: Coord }
  | { kind: "selected"; coord: Coord; previous?: Coord }
  | { kind: "swapped"; origin: Coord; target: Coord; axis: Exclude<SwapAxis, "invalid"> }
  | { kind: "swap-started"; origin: Coord; target: Coord; axis: Exclude<SwapAxis, "invalid"> };

export interface SwapFrame {
  origin: Coord;
  target: Coord;
  ratio: number;
  originPosition: WorldPosition;
  targetPosition: WorldPosition;
  completed: boolean;
}

export interface SwapThresholds {
  selfDistance: number;
  neighborDistance: number;
}

export interface SelectionControllerOptions extends Partial<SwapThresholds> {
  mode?: SwapMode;
  swapDuration?: number;
  now?: () => number;
}

const DEFAULT_THRESHOLDS: SwapThresholds = {
  selfDistance: SELF_DISTANCE,
  neighborDistance: NEIGHBOR_DISTANCE
};

/**
 * Axis-aligned neighbours only: the distance along one axis must sit strictly
 * between the two thresholds while the other axis stays within the self
 * threshold.
 */
export function classifySwap(
  from: { x: number; y: number },
  to: { x: number; y: number },
  thresholds: SwapThresholds = DEFAULT_THRESHOLDS
): SwapAxis {
  const dx = Math.abs(from.x - to.x);
  const dy = Math.abs(from.y - to.y);
  const isStep = (delta: number) => delta > thresholds.selfDistance && delta < thresholds.neighborDistance;
  const isStill = (delta: number) => delta < thresholds.selfDistance;

  if (isStep(dx) && isStill(dy)) return "horizontal";
  if (isStep(dy) && isStill(dx)) return "vertical";
  return "invalid";
}

export function lerpPosition(from: WorldPosition, to: WorldPosition, ratio: number): WorldPosition {
  return {
    x: from.x + (to.x - from.x) * ratio,
    y: from.y + (to.y - from.y) * ratio,
    z: from.z + (to.z - from.z) * ratio
  };
}

export function interpolateSwap(
  swap: Pick<SwapOperation, "origin" | "target">,
  ratio: number
): { originPosition: WorldPosition; targetPosition: WorldPosition } {
  return {
    originPosition: lerpPosition(swap.origin.position, swap.target.position, ratio),
    targetPosition: lerpPosition(swap.target.position, swap.origin.position, ratio)
  };
}

function sameCoord(a: Coord, b: Coord): boolean {
  return a.x === b.x && a.y === b.y;
}

export class SelectionController {
  private state: SelectionState = { kind: "idle" };
  private readonly mode: SwapMode;
  private readonly duration: number;
  private readonly thresholds: SwapThresholds;
  private readonly now: () => number;
  private readonly resolver: TileResolver;
  private readonly board: SwapTarget;
  private readonly sink: SelectionSink;

  constructor(
    resolver: TileResolver,
    board: SwapTarget,
    sink: SelectionSink,
    options: SelectionControllerOptions = {}
  ) {
    this.resolver = resolver;
    this.board = board;
    this.sink = sink;
    this.mode = options.mode ?? "animated";
    this.duration = options.swapDuration ?? SWAP_DURATION;
    if (!Number.isFinite(this.duration) || this.duration <= 0) {
      throw new RangeError(`swapDuration must be a positive number of seconds, got ${this.duration}.`);
    }
    this.thresholds = {
      selfDistance: options.selfDistance ?? DEFAULT_THRESHOLDS.selfDistance,
      neighborDistance: options.neighborDistance ?? DEFAULT_THRESHOLDS.neighborDistance
    };
    this.now = options.now ?? Date.now;
  }

  public getState(): SelectionState {
    return this.state;
  }

  public isBusy(): boolean {
    return this.state.kind === "swapping";
  }

  public onInput(input: PointerInput): SelectionTransition {
    if (this.state.kind === "swapping") {
      return { kind: "ignored", reason: "busy" };
    }
    if (!input.position) {
      return { kind: "ignored", reason: "no-position" };
    }
    const picked = this.resolver.pickTile(input.position);
    if (!picked) {
      return { kind: "ignored", reason: "no-tile" };
    }

    if (this.state.kind === "idle") {
      return this.select(picked);
    }

    const selected = this.state.tile;
    if (sameCoord(selected.coord, picked.coord)) {
      return { kind: "unchanged", coord: selected.coord };
    }

    const axis = classifySwap(selected.position, picked.position, this.thresholds);
    if (axis === "invalid") {
      this.sink.setHighlighted(selected.coord, false);
      return this.select(picked, selected.coord);
    }

    this.sink.setHighlighted(selected.coord, false);

    if (this.mode === "instant") {
      this.board.swap(selected.coord, picked.coord);
      this.sink.setPosition(selected.coord, picked.position);
      this.sink.setPosition(picked.coord, selected.position);
      this.sink.swapTiles(selected.coord, picked.coord);
      this.state = { kind: "idle" };
      return { kind: "swapped", origin: selected.coord, target: picked.coord, axis };
    }

    this.state = {
      kind: "swapping",
      swap: {
        origin: selected,
        target: picked,
        axis,
        startedAt: this.now(),
        elapsed: 0,
        duration: this.duration
      }
    };
    return { kind: "swap-started", origin: selected.coord, target: picked.coord, axis };
  }

  /**
   * Advances an animated swap by `delta` seconds. The ratio is not clamped,
   * so the completing frame can land slightly past the target.
   */
  public onTick(delta: number): SwapFrame | null {
    if (this.state.kind !== "swapping") return null;
    const swap = this.state.swap;
    swap.elapsed += delta;
    const ratio = swap.elapsed / swap.duration;
    const { originPosition, targetPosition } = interpolateSwap(swap, ratio);

    this.sink.setPosition(swap.origin.coord, originPosition);
    this.sink.setPosition(swap.target.coord, targetPosition);

    const completed = swap.elapsed > swap.duration;
    if (completed) {
      this.board.swap(swap.origin.coord, swap.target.coord);
      this.sink.swapTiles(swap.origin.coord, swap.target.coord);
      this.state = { kind: "idle" };
    }

    return {
      origin: swap.origin.coord,
      target: swap.target.coord,
      ratio,
      originPosition,
      targetPosition,
      completed
    };
  }

  /**
   * Drops the current selection. Refused while a swap is animating, since
   * swaps always run to completion.
   */
  public reset(): boolean {
    if (this.state.kind === "swapping") return false;
    if (this.state.kind === "selected") {
      this.sink.setHighlighted(this.state.tile.coord, false);
    }
    this.state = { kind: "idle" };
    return true;
  }

  private select(tile: PickedTile, previous?: Coord): SelectionTransition {
    this.sink.setHighlighted(tile.coord, true);
    this.state = { kind: "selected", tile };
    return previous ? { kind: "selected", coord: tile.coord, previous } : { kind: "selected", coord: tile.coord };
  }
}
