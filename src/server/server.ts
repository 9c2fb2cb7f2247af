import "dotenv/config";
import cors from "cors";
import express from "express";
import type { Request, Response } from "express";
import { randomUUID } from "crypto";
import { createServer } from "http";
import type { Server as HttpServer } from "http";
import type { Http2SecureServer } from "http2";
import { Server as SocketIOServer, Socket } from "socket.io";
import fs from "fs";
import path from "path";
import { fileURLToPath, pathToFileURL } from "url";
import { BoardConfigError } from "../shared/rules.js";
import {
  createBoardRoom,
  parseBoardRequest,
  parseCoord,
  regenerateRoomBoard,
  swapRoomTiles,
  toPublicBoard
} from "./boardState.js";
import { loadServerConfig, type ServerConfig } from "./config.js";
import type { BoardRoom } from "./types.js";

interface BackendOptions {
  serveClient?: boolean;
  clientDistPath?: string;
  config?: ServerConfig;
}

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const MAX_BOARDS = 500;
const boards = new Map<string, BoardRoom>();
let activeIo: SocketIOServer | null = null;

type ExpressApp = ReturnType<typeof express>;

export function initializeBackend(
  app: ExpressApp,
  httpServer: HttpServer | Http2SecureServer,
  options: BackendOptions = {}
) {
  const config = options.config ?? loadServerConfig();
  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json());

  const io = new SocketIOServer(httpServer, {
    cors: {
      origin: config.corsOrigin,
      methods: ["GET", "POST"]
    }
  });
  activeIo = io;

  registerHttpRoutes(app, options, config);
  registerSocketHandlers(io);

  return { io };
}

function registerHttpRoutes(app: ExpressApp, options: BackendOptions, config: ServerConfig) {
  const serveClient = options.serveClient ?? true;
  const candidateDirs = [
    options.clientDistPath,
    path.resolve(__dirname, "../client"),
    path.resolve(process.cwd(), "dist/client")
  ].filter((dir): dir is string => Boolean(dir));
  const staticDir = candidateDirs.find((dir) => fs.existsSync(dir));
  if (serveClient && staticDir) {
    log("Serving static assets from", staticDir);
    app.use(express.static(staticDir));
  }

  app.get("/api/health", (_req: Request, res: Response) => {
    log("GET /api/health");
    res.json({ status: "ok" });
  });

  app.post("/api/boards", (req: Request, res: Response) => {
    log("POST /api/boards", req.body);
    const parsed = parseBoardRequest(req.body);
    if (!parsed.success || !parsed.options) {
      return res.status(400).json({ error: parsed.error ?? "Invalid board options." });
    }
    if (boards.size >= MAX_BOARDS) {
      evictOldestBoard();
    }

    try {
      const room = createBoardRoom(generateBoardId(), {
        width: config.boardWidth,
        height: config.boardHeight,
        maxShuffleIterations: config.maxShuffleIterations,
        debug: config.debugBoards,
        ...parsed.options
      });
      boards.set(room.id, room);
      res.status(201).json({ board: toPublicBoard(room) });
    } catch (error) {
      if (error instanceof BoardConfigError) {
        return res.status(400).json({ error: error.message });
      }
      throw error;
    }
  });

  app.get("/api/boards/:boardId", (req: Request, res: Response) => {
    log("GET /api/boards/:boardId", req.params.boardId);
    const room = boards.get(req.params.boardId);
    if (!room) {
      return res.status(404).json({ error: "Board not found" });
    }
    res.json(toPublicBoard(room));
  });

  app.post("/api/boards/:boardId/regenerate", (req: Request, res: Response) => {
    log("POST /api/boards/:boardId/regenerate", req.params.boardId);
    const room = boards.get(req.params.boardId);
    if (!room) {
      return res.status(404).json({ error: "Board not found" });
    }
    regenerateRoomBoard(room);
    broadcastBoard(room.id);
    res.json({ board: toPublicBoard(room) });
  });
}

function registerSocketHandlers(io: SocketIOServer) {
  io.on("connection", (socket: Socket) => {
    log("socket connected", socket.id, socket.handshake.auth);
    const rawBoardId: unknown = socket.handshake.auth?.boardId;
    const boardId = typeof rawBoardId === "string" ? rawBoardId : undefined;
    const room = boardId ? boards.get(boardId) : undefined;
    if (!boardId || !room) {
      socket.emit("board:error", { message: "Board not found" });
      socket.disconnect(true);
      return;
    }

    void socket.join(boardId);
    log("socket join board", socket.id, boardId);
    socket.emit("board:update", toPublicBoard(room));

    socket.on("board:swap", (payload: { from?: unknown; to?: unknown }) => {
      log("board:swap", boardId, payload);
      const current = boards.get(boardId);
      if (!current) {
        return socket.emit("board:error", { message: "Board not found" });
      }
      const from = parseCoord(payload?.from);
      const to = parseCoord(payload?.to);
      if (!from || !to) {
        return socket.emit("board:error", { message: "Both tiles are required." });
      }
      const result = swapRoomTiles(current, from, to);
      if (!result.success) {
        socket.emit("board:error", { message: result.error ?? "Unable to swap." });
        // Resync the sender, whose local board already moved.
        socket.emit("board:update", toPublicBoard(current));
        return;
      }
      broadcastBoard(boardId);
    });

    socket.on("board:regenerate", () => {
      log("board:regenerate", boardId);
      const current = boards.get(boardId);
      if (!current) {
        return socket.emit("board:error", { message: "Board not found" });
      }
      regenerateRoomBoard(current);
      broadcastBoard(boardId);
    });

    socket.on("disconnect", () => {
      log("socket disconnected", socket.id);
    });
  });
}

function log(...args: unknown[]) {
  console.log("[server]", ...args);
}

function generateBoardId(): string {
  let id: string;
  do {
    id = randomUUID().slice(0, 8).toUpperCase();
  } while (boards.has(id));
  return id;
}

function evictOldestBoard() {
  let oldest: BoardRoom | undefined;
  for (const room of boards.values()) {
    if (!oldest || room.updatedAt < oldest.updatedAt) {
      oldest = room;
    }
  }
  if (oldest) {
    log("evicting board", oldest.id);
    boards.delete(oldest.id);
  }
}

function broadcastBoard(boardId: string) {
  const room = boards.get(boardId);
  if (room && activeIo) {
    activeIo.to(boardId).emit("board:update", toPublicBoard(room));
  }
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  return pathToFileURL(entry).href === import.meta.url;
}

if (isMainModule()) {
  const config = loadServerConfig();
  const app = express();
  const httpServer = createServer(app);
  initializeBackend(app, httpServer, {
    serveClient: true,
    clientDistPath: path.resolve(process.cwd(), "dist/client"),
    config
  });
  httpServer.listen(config.port, "0.0.0.0", () => {
    console.log(`Gem Swap server listening on port ${config.port}`);
  });
}
