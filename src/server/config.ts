import { GRID_HEIGHT, GRID_WIDTH, MAX_SHUFFLE_ITERATIONS } from "../shared/constants.js";

export interface ServerConfig {
  port: number;
  corsOrigin: string;
  boardWidth: number;
  boardHeight: number;
  maxShuffleIterations: number;
  debugBoards: boolean;
}

type Env = Record<string, string | undefined>;

export function loadServerConfig(env: Env = process.env): ServerConfig {
  return {
    port: readInteger(env, "PORT", 4000, 1),
    corsOrigin: env.CORS_ORIGIN?.trim() || "*",
    boardWidth: readInteger(env, "BOARD_WIDTH", GRID_WIDTH, 3),
    boardHeight: readInteger(env, "BOARD_HEIGHT", GRID_HEIGHT, 3),
    maxShuffleIterations: readInteger(env, "MAX_SHUFFLE_ITERATIONS", MAX_SHUFFLE_ITERATIONS, 1),
    debugBoards: readFlag(env, "BOARD_DEBUG")
  };
}

function readInteger(env: Env, key: string, fallback: number, min: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${key} must be an integer >= ${min}, got "${raw}".`);
  }
  return value;
}

function readFlag(env: Env, key: string): boolean {
  const raw = env[key]?.trim().toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes";
}
