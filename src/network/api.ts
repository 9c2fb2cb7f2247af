import type { BoardSnapshot } from "../shared/gameTypes";

export interface CreateBoardRequest {
  width?: number;
  height?: number;
  tileKinds?: number;
  seed?: number;
}

export interface BoardResponse {
  board: BoardSnapshot;
}

const API_BASE = (() => {
  const configured = import.meta.env.VITE_SERVER_URL;
  if (configured && configured.trim().length) {
    return configured;
  }
  return typeof window !== "undefined"
    ? window.location.origin
    : "http://localhost:8900";
})();

async function request<T>(path: string, options: RequestInit): Promise<T> {
  console.log("[client][api]", options?.method ?? "GET", path, options?.body ?? "");
  const res = await fetch(`${API_BASE}${path}`, {
    headers: {
      "Content-Type": "application/json"
    },
    ...options
  });
  if (!res.ok) {
    const err: { error?: string } = await res.json().catch(() => ({}));
    console.warn("[client][api] error", path, err);
    throw new Error(err.error ?? res.statusText);
  }
  console.log("[client][api] success", path);
  return res.json();
}

export function createBoard(options: CreateBoardRequest = {}): Promise<BoardResponse> {
  return request("/api/boards", {
    method: "POST",
    body: JSON.stringify(options)
  });
}

export function getBoard(boardId: string): Promise<BoardSnapshot> {
  return request(`/api/boards/${encodeURIComponent(boardId)}`, {
    method: "GET"
  });
}
