import {
  Clock,
  OrthographicCamera,
  Raycaster,
  Scene,
  Vector2,
  WebGLRenderer
} from "three";
import type { BoardSnapshot, Coord } from "../shared/gameTypes";
import { BoardGrid } from "../shared/boardGrid";
import {
  SelectionController,
  type PickedTile,
  type ScreenPoint,
  type SelectionTransition,
  type SwapMode,
  type TileResolver
} from "../shared/selection";
import { GemBoard } from "./GemBoard";

export interface BoardController {
  swap(from: Coord, to: Coord): void | Promise<void>;
  regenerate(): void | Promise<void>;
}

export interface GemSwapGameOptions {
  controller: BoardController;
  swapMode?: SwapMode;
  title?: string;
}

export class GemSwapGame implements TileResolver {
  private frustumSize = 12;
  private container: HTMLElement;
  private boardViewport: HTMLDivElement;
  private statusLine: HTMLDivElement;
  private newBoardButton: HTMLButtonElement;
  private scene = new Scene();
  private camera: OrthographicCamera;
  private renderer: WebGLRenderer;
  private board = new GemBoard();
  private grid: BoardGrid;
  private selection: SelectionController;
  private controller: BoardController;
  private pointer = new Vector2();
  private raycaster = new Raycaster();
  private clock = new Clock();
  private animationId = 0;
  private snapshot: BoardSnapshot;
  private pendingSnapshot?: BoardSnapshot;

  constructor(target: HTMLElement, initial: BoardSnapshot, options: GemSwapGameOptions) {
    this.container = target;
    this.controller = options.controller;
    this.snapshot = initial;
    this.grid = BoardGrid.fromRows(initial.rows);

    this.container.innerHTML = "";
    this.container.classList.add("game-shell");

    this.boardViewport = document.createElement("div");
    this.boardViewport.className = "board-viewport";
    this.container.append(this.boardViewport);

    const hud = this.createHud(options.title ?? "Gem Swap");
    this.statusLine = hud.status;
    this.newBoardButton = hud.newBoardBtn;

    this.renderer = new WebGLRenderer({ antialias: true });
    this.renderer.setClearColor(0x000000, 0);
    this.renderer.setPixelRatio(Math.min(window.devicePixelRatio, 2));
    this.boardViewport.appendChild(this.renderer.domElement);

    const aspect = (this.boardViewport.clientWidth || 1) / (this.boardViewport.clientHeight || 1);
    this.camera = new OrthographicCamera(
      (-this.frustumSize * aspect) / 2,
      (this.frustumSize * aspect) / 2,
      this.frustumSize / 2,
      -this.frustumSize / 2,
      0.1,
      50
    );
    this.camera.position.set(0, 0, 15);
    this.camera.lookAt(0, 0, 0);

    this.board.materialize(initial.rows);
    this.scene.add(this.board);

    this.selection = new SelectionController(
      this,
      {
        swap: (a, b) => this.commitSwap(a, b)
      },
      this.board,
      { mode: options.swapMode ?? "animated" }
    );

    this.onResize();
    this.updateStatus();

    this.renderer.domElement.addEventListener("pointerup", this.onPointerUp);
    this.newBoardButton.addEventListener("click", this.onNewBoard);
    window.addEventListener("resize", this.onResize);

    this.tick = this.tick.bind(this);
    this.tick();
  }

  public dispose() {
    cancelAnimationFrame(this.animationId);
    this.renderer.domElement.removeEventListener("pointerup", this.onPointerUp);
    this.newBoardButton.removeEventListener("click", this.onNewBoard);
    window.removeEventListener("resize", this.onResize);
    this.renderer.dispose();
  }

  public pickTile(point: ScreenPoint): PickedTile | null {
    const rect = this.renderer.domElement.getBoundingClientRect();
    if (!rect.width || !rect.height) return null;
    this.pointer.x = ((point.x - rect.left) / rect.width) * 2 - 1;
    this.pointer.y = -((point.y - rect.top) / rect.height) * 2 + 1;
    this.raycaster.setFromCamera(this.pointer, this.camera);
    const intersects = this.raycaster.intersectObjects(this.board.tileMeshes(), false);
    if (!intersects.length) return null;
    return this.board.tileFromObject(intersects[0].object);
  }

  /**
   * Takes a board state pushed from the server. Held back while a swap is
   * animating and applied once it lands.
   */
  public applySnapshot(snapshot: BoardSnapshot) {
    if (this.selection.isBusy()) {
      this.pendingSnapshot = snapshot;
      return;
    }
    const regenerated =
      snapshot.width !== this.grid.width ||
      snapshot.height !== this.grid.height ||
      snapshot.shuffleIterations !== this.snapshot.shuffleIterations ||
      snapshot.swaps < this.snapshot.swaps;
    this.snapshot = snapshot;
    this.grid = BoardGrid.fromRows(snapshot.rows);
    if (regenerated) {
      this.selection.reset();
      this.board.materialize(snapshot.rows);
      this.onResize();
    } else {
      this.board.applyRows(snapshot.rows);
    }
    this.updateStatus();
  }

  public setStatus(message: string) {
    this.statusLine.textContent = message;
  }

  // Pointer and touch both arrive here; pointerup fires once a tap ends.
  private onPointerUp = (event: PointerEvent) => {
    if (event.pointerType === "mouse" && event.button !== 0) return;
    const transition = this.selection.onInput({ position: { x: event.clientX, y: event.clientY } });
    this.describeTransition(transition);
  };

  private onNewBoard = () => {
    if (this.selection.isBusy()) return;
    this.selection.reset();
    Promise.resolve(this.controller.regenerate()).catch((error: unknown) => {
      console.warn("[client][game] regenerate failed", error);
      this.setStatus("Could not create a new board.");
    });
  };

  private commitSwap(a: Coord, b: Coord) {
    this.grid.swap(a, b);
    this.snapshot = { ...this.snapshot, rows: this.grid.rows(), swaps: this.snapshot.swaps + 1 };
    Promise.resolve(this.controller.swap(a, b)).catch((error: unknown) => {
      console.warn("[client][game] swap failed", error);
    });
  }

  private describeTransition(transition: SelectionTransition) {
    if (transition.kind === "swapped" || transition.kind === "swap-started") {
      console.log(
        "[client][game]",
        transition.kind,
        transition.axis,
        transition.origin,
        transition.target
      );
    }
    if (transition.kind === "swapped") {
      this.updateStatus();
    }
  }

  private updateStatus() {
    const matches = this.grid.countLocalMatches();
    const generation = this.snapshot.settled
      ? `settled in ${this.snapshot.shuffleIterations} pass(es)`
      : `${this.snapshot.shuffleIterations} pass(es), not settled`;
    this.setStatus(
      `${this.grid.width}x${this.grid.height} · ${generation} · swaps ${this.snapshot.swaps} · matching cells ${matches}`
    );
  }

  private createHud(title: string) {
    const hud = document.createElement("div");
    hud.className = "hud";

    const heading = document.createElement("div");
    heading.className = "hud__title";
    heading.textContent = title;

    const status = document.createElement("div");
    status.className = "hud__status";

    const newBoardBtn = document.createElement("button");
    newBoardBtn.textContent = "New Board";
    newBoardBtn.className = "hud__btn primary";

    hud.append(heading, status, newBoardBtn);
    this.container.prepend(hud);
    return { status, newBoardBtn };
  }

  private onResize = () => {
    const width = this.boardViewport.clientWidth;
    const height = this.boardViewport.clientHeight;
    if (!width || !height) return;
    const aspect = width / height;

    this.camera.left = (-this.frustumSize * aspect) / 2;
    this.camera.right = (this.frustumSize * aspect) / 2;
    this.camera.top = this.frustumSize / 2;
    this.camera.bottom = -this.frustumSize / 2;
    this.camera.updateProjectionMatrix();

    this.renderer.setSize(width, height);
    this.updateBoardPlacement(aspect);
  };

  private updateBoardPlacement(aspect: number) {
    const span = Math.max(this.board.columns, this.board.rowCount, 1);
    const available = Math.min(this.frustumSize * aspect, this.frustumSize) - 1;
    this.board.scale.setScalar(available / span);
    this.board.position.set(0, 0, 0);
  }

  private tick() {
    this.animationId = requestAnimationFrame(this.tick);
    const frame = this.selection.onTick(this.clock.getDelta());
    if (frame?.completed) {
      this.updateStatus();
      if (this.pendingSnapshot) {
        const pending = this.pendingSnapshot;
        this.pendingSnapshot = undefined;
        this.applySnapshot(pending);
      }
    }
    this.renderer.render(this.scene, this.camera);
  }
}
