import { io, Socket } from "socket.io-client";
import type { BoardSnapshot, Coord } from "../shared/gameTypes";

const SOCKET_BASE = (() => {
  const configured = import.meta.env.VITE_SERVER_URL;
  if (configured && configured.trim().length) {
    return configured;
  }
  return typeof window !== "undefined" ? window.location.origin : "http://localhost:4000";
})();

export interface BoardSocketHandlers {
  onBoardUpdate(board: BoardSnapshot): void;
  onDisconnect(reason: string): void;
  onError?(message: string): void;
  onReconnect?(): void;
}

interface ServerToClientEvents {
  "board:update": (board: BoardSnapshot) => void;
  "board:error": (payload: { message: string }) => void;
}

interface ClientToServerEvents {
  "board:swap": (payload: { from: Coord; to: Coord }) => void;
  "board:regenerate": () => void;
}

export type BoardSocket = Socket<ServerToClientEvents, ClientToServerEvents>;

export function connectBoardSocket(boardId: string, handlers: BoardSocketHandlers): BoardSocket {
  console.log("[client][socket] connecting", boardId);
  const socket: BoardSocket = io(SOCKET_BASE, {
    transports: ["websocket"],
    forceNew: true,
    reconnection: true,
    auth: { boardId }
  });

  socket.on("board:update", (board: BoardSnapshot) => {
    console.log("[client][socket] board:update", board.id, board.swaps);
    handlers.onBoardUpdate(board);
  });

  socket.on("board:error", (payload: { message: string }) => {
    console.warn("[client][socket] board:error", payload);
    handlers.onError?.(payload.message);
  });

  socket.on("connect_error", (err) => {
    console.warn("[client][socket] connect_error", err);
    handlers.onError?.(err.message ?? "Connection error");
  });

  socket.on("disconnect", (reason) => {
    console.log("[client][socket] disconnect", reason);
    handlers.onDisconnect(reason);
  });

  socket.on("connect", () => {
    console.log("[client][socket] connected");
  });

  socket.io.on("reconnect", () => {
    console.log("[client][socket] reconnect");
    handlers.onReconnect?.();
  });

  return socket;
}
