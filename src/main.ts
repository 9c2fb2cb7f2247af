import "./style.css";
import { GemSwapGame, type BoardController } from "./game/GemSwapGame";
import { OfflineAdapter } from "./game/offlineAdapter";
import { createBoard, getBoard } from "./network/api";
import { connectBoardSocket, type BoardSocket } from "./network/socket";
import type { BoardSnapshot } from "./shared/gameTypes";
import type { SwapMode } from "./shared/selection";

const app = document.querySelector<HTMLDivElement>("#app");

let game: GemSwapGame | null = null;
let socket: BoardSocket | null = null;

function resolveSwapMode(): SwapMode {
  return import.meta.env.VITE_SWAP_MODE === "instant" ? "instant" : "animated";
}

function setBoardParam(boardId: string) {
  const params = new URLSearchParams(window.location.search);
  params.set("board", boardId);
  window.history.replaceState({}, "", `${window.location.pathname}?${params.toString()}`);
}

function startOffline(target: HTMLElement) {
  const adapter = new OfflineAdapter();
  const controller: BoardController = {
    swap: (from, to) => {
      const result = adapter.swap(from, to);
      if (!result.success) {
        console.warn("[client][offline] swap rejected", result.error);
        game?.applySnapshot(adapter.snapshot());
      }
    },
    regenerate: () => {
      adapter.regenerate();
      game?.applySnapshot(adapter.snapshot());
    }
  };
  game = new GemSwapGame(target, adapter.snapshot(), {
    controller,
    swapMode: resolveSwapMode(),
    title: "Gem Swap (offline)"
  });
}

async function startOnline(target: HTMLElement, requested: string) {
  const initial: BoardSnapshot =
    requested === "new" ? (await createBoard()).board : await getBoard(requested);
  setBoardParam(initial.id);

  const connection = connectBoardSocket(initial.id, {
    onBoardUpdate: (board) => game?.applySnapshot(board),
    onDisconnect: (reason) => game?.setStatus(`Disconnected (${reason}).`),
    onError: (message) => game?.setStatus(message),
    onReconnect: () => {
      getBoard(initial.id)
        .then((board) => game?.applySnapshot(board))
        .catch((error: unknown) => console.warn("[client] resync failed", error));
    }
  });
  socket = connection;

  const controller: BoardController = {
    swap: (from, to) => {
      console.log("[client][socket] emit board:swap", from, to);
      connection.emit("board:swap", { from, to });
    },
    regenerate: () => {
      console.log("[client][socket] emit board:regenerate");
      connection.emit("board:regenerate");
    }
  };
  game = new GemSwapGame(target, initial, {
    controller,
    swapMode: resolveSwapMode(),
    title: `Gem Swap · ${initial.id}`
  });
}

function stop() {
  socket?.disconnect();
  socket = null;
  game?.dispose();
  game = null;
}

if (app) {
  const requested = new URLSearchParams(window.location.search).get("board");
  if (requested) {
    startOnline(app, requested).catch((error: unknown) => {
      const message = error instanceof Error ? error.message : "Unable to load board.";
      console.warn("[client] falling back to offline board:", message);
      stop();
      startOffline(app);
    });
  } else {
    startOffline(app);
  }
  window.addEventListener("beforeunload", stop);
}
