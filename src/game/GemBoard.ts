import {
  CanvasTexture,
  Group,
  Mesh,
  MeshBasicMaterial,
  PlaneGeometry,
  Texture
} from "three";
import type { Coord, TileType } from "../shared/gameTypes";
import type { PickedTile, SelectionSink, WorldPosition } from "../shared/selection";

export type TileMesh = Mesh<PlaneGeometry, MeshBasicMaterial>;

export type TileState = "base" | "selected";

export interface GemTile {
  coord: Coord;
  type: TileType;
  mesh: TileMesh;
  state: TileState;
}

interface TileAppearance {
  color: string;
  glyph: string;
}

const TILE_APPEARANCE: Record<TileType, TileAppearance> = {
  apple: { color: "#e53946", glyph: "🍎" },
  pineapple: { color: "#f2b632", glyph: "🍍" },
  banana: { color: "#f7e067", glyph: "🍌" },
  orange: { color: "#f28c28", glyph: "🍊" },
  strawberry: { color: "#d7265b", glyph: "🍓" },
  kiwi: { color: "#78b83b", glyph: "🥝" }
};

/**
 * Three.js view of a board. Tiles sit one unit apart in the group's local
 * space, so positions reported to the selection controller are in tile units
 * no matter how the group is scaled.
 */
export class GemBoard extends Group implements SelectionSink {
  private cols = 0;
  private rows = 0;
  private tiles = new Map<string, GemTile>();
  private baseGeometry = new PlaneGeometry(0.92, 0.92);
  private textureCache = new Map<string, Texture>();

  constructor() {
    super();
    this.name = "GemBoard";
  }

  public get columns(): number {
    return this.cols;
  }

  public get rowCount(): number {
    return this.rows;
  }

  /**
   * Destroys the current tile meshes and creates one per cell.
   */
  public materialize(rows: TileType[][]) {
    this.clearTiles();
    this.rows = rows.length;
    this.cols = rows[0]?.length ?? 0;

    rows.forEach((row, y) => {
      row.forEach((type, x) => {
        const material = new MeshBasicMaterial({
          map: this.getTileTexture(type, "base"),
          transparent: true
        });
        const mesh: TileMesh = new Mesh<PlaneGeometry, MeshBasicMaterial>(this.baseGeometry, material);
        mesh.name = `Tile ${x},${y}`;
        const home = this.homePosition({ x, y });
        mesh.position.set(home.x, home.y, home.z);

        const tile: GemTile = { coord: { x, y }, type, mesh, state: "base" };
        mesh.userData.tile = tile;
        this.tiles.set(tileKey(tile.coord), tile);
        this.add(mesh);
      });
    });
  }

  /**
   * Brings the view in line with a board state received from elsewhere.
   * Cells whose type differs are re-textured and snapped home; a change in
   * dimensions rebuilds everything.
   */
  public applyRows(rows: TileType[][]) {
    if (rows.length !== this.rows || (rows[0]?.length ?? 0) !== this.cols) {
      this.materialize(rows);
      return;
    }
    rows.forEach((row, y) => {
      row.forEach((type, x) => {
        const tile = this.tiles.get(tileKey({ x, y }));
        if (!tile || tile.type === type) return;
        tile.type = type;
        const home = this.homePosition(tile.coord);
        tile.mesh.position.set(home.x, home.y, home.z);
        this.applyStyle(tile, tile.state);
      });
    });
  }

  public tileFromObject(object: { userData: Record<string, unknown> }): PickedTile | null {
    const tile = object.userData.tile;
    if (!isGemTile(tile)) return null;
    const { x, y, z } = tile.mesh.position;
    return { coord: { ...tile.coord }, position: { x, y, z } };
  }

  public setHighlighted(coord: Coord, highlighted: boolean) {
    const tile = this.tiles.get(tileKey(coord));
    if (!tile) return;
    this.applyStyle(tile, highlighted ? "selected" : "base");
  }

  public setPosition(coord: Coord, position: WorldPosition) {
    const tile = this.tiles.get(tileKey(coord));
    if (!tile) return;
    tile.mesh.position.set(position.x, position.y, position.z);
  }

  public swapTiles(a: Coord, b: Coord) {
    const first = this.tiles.get(tileKey(a));
    const second = this.tiles.get(tileKey(b));
    if (!first || !second) return;
    first.coord = { ...b };
    second.coord = { ...a };
    first.mesh.name = `Tile ${b.x},${b.y}`;
    second.mesh.name = `Tile ${a.x},${a.y}`;
    this.tiles.set(tileKey(b), first);
    this.tiles.set(tileKey(a), second);
  }

  public tileMeshes(): TileMesh[] {
    return Array.from(this.tiles.values(), (tile) => tile.mesh);
  }

  private homePosition(coord: Coord): WorldPosition {
    // Row 0 is drawn at the top.
    return {
      x: coord.x - this.cols / 2 + 0.5,
      y: this.rows / 2 - 0.5 - coord.y,
      z: 0
    };
  }

  private clearTiles() {
    this.tiles.forEach((tile) => {
      tile.mesh.material.dispose();
      tile.mesh.removeFromParent();
    });
    this.tiles.clear();
  }

  private applyStyle(tile: GemTile, state: TileState) {
    tile.state = state;
    tile.mesh.material.map = this.getTileTexture(tile.type, state);
    tile.mesh.material.needsUpdate = true;
    tile.mesh.renderOrder = state === "selected" ? 2 : 0;
  }

  private getTileTexture(type: TileType, state: TileState): Texture {
    const key = `${type}-${state}`;
    const cached = this.textureCache.get(key);
    if (cached) return cached;

    const tex = this.makeTileTexture(type, state);
    this.textureCache.set(key, tex);
    return tex;
  }

  private makeTileTexture(type: TileType, state: TileState): Texture {
    const size = 256;
    const canvas = document.createElement("canvas");
    canvas.width = size;
    canvas.height = size;
    const ctx = canvas.getContext("2d");
    if (!ctx) throw new Error("Failed to get 2d context");

    const appearance = TILE_APPEARANCE[type];
    const inset = 14;
    const radius = 36;

    ctx.beginPath();
    ctx.moveTo(inset + radius, inset);
    ctx.arcTo(size - inset, inset, size - inset, size - inset, radius);
    ctx.arcTo(size - inset, size - inset, inset, size - inset, radius);
    ctx.arcTo(inset, size - inset, inset, inset, radius);
    ctx.arcTo(inset, inset, size - inset, inset, radius);
    ctx.closePath();
    ctx.fillStyle = state === "selected" ? "#39b9ff" : "#f8f9fb";
    ctx.fill();
    ctx.lineWidth = 10;
    ctx.strokeStyle = appearance.color;
    ctx.stroke();

    ctx.font = "150px 'Segoe UI Emoji', 'Apple Color Emoji', sans-serif";
    ctx.textAlign = "center";
    ctx.textBaseline = "middle";
    ctx.shadowColor = state === "selected" ? "rgba(8, 85, 140, 0.55)" : "rgba(0,0,0,0.25)";
    ctx.shadowBlur = state === "selected" ? 22 : 12;
    ctx.fillText(appearance.glyph, size / 2, size / 2 + 8);

    const texture = new CanvasTexture(canvas);
    texture.needsUpdate = true;
    return texture;
  }
}

function tileKey(coord: Coord): string {
  return `${coord.x}-${coord.y}`;
}

function isGemTile(value: unknown): value is GemTile {
  return Boolean(value) && typeof value === "object" && value !== null && "coord" in value && "mesh" in value;
}
