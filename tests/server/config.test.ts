import { describe, it, expect } from "vitest";
import { loadServerConfig } from "../../src/server/config.js";

describe("loadServerConfig", () => {
  it("falls back to defaults", () => {
    expect(loadServerConfig({})).toEqual({
      port: 4000,
      corsOrigin: "*",
      boardWidth: 8,
      boardHeight: 8,
      maxShuffleIterations: 200,
      debugBoards: false
    });
  });

  it("reads values from the environment", () => {
    const config = loadServerConfig({
      PORT: "5000",
      CORS_ORIGIN: " http://localhost:5173 ",
      BOARD_WIDTH: "10",
      BOARD_HEIGHT: "  ",
      MAX_SHUFFLE_ITERATIONS: "50",
      BOARD_DEBUG: "TRUE"
    });
    expect(config).toEqual({
      port: 5000,
      corsOrigin: "http://localhost:5173",
      boardWidth: 10,
      boardHeight: 8,
      maxShuffleIterations: 50,
      debugBoards: true
    });
  });

  it("rejects invalid integers", () => {
    expect(() => loadServerConfig({ BOARD_WIDTH: "2" })).toThrow('BOARD_WIDTH must be an integer >= 3, got "2".');
    expect(() => loadServerConfig({ PORT: "abc" })).toThrow('PORT must be an integer >= 1, got "abc".');
  });
});
