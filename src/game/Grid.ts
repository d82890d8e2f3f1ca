import { InvalidCommandError, OutOfBoundsError } from "../errors";
import { COLORED_TILE_TYPES, POWER_UP_TILE_TYPES, TileType } from "../types";
import type { GridPosition } from "../types";
import { Tile } from "./Tile";

const TYPE_TO_CHAR: Record<TileType, string> = {
  [TileType.Red]: "R",
  [TileType.Yellow]: "Y",
  [TileType.Green]: "G",
  [TileType.Blue]: "B",
  [TileType.RocketHorizontal]: "H",
  [TileType.RocketVertical]: "V",
  [TileType.Snitch]: "S",
  [TileType.SnitchLucky]: "L",
};

const CHAR_TO_TYPE = new Map<string, TileType>(
  [...COLORED_TILE_TYPES, ...POWER_UP_TILE_TYPES].map((type): [string, TileType] => [TYPE_TO_CHAR[type], type]),
);

/**
 * Rectangular board of `width × height` cells, each holding at most one
 * tile. A tile's `(x, y)` always equals the slot that references it.
 */
export class Grid {
  readonly width: number;
  readonly height: number;
  private cells: (Tile | null)[][];
  private nextTileId = 1;

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
    this.cells = Array.from({ length: width }, () => Array.from({ length: height }, () => null));
  }

  /**
   * Build a grid from text rows, top row first (so the fixture reads like the
   * board). `R Y G B` colors, `H V` rockets, `S L` snitches, `.` empty.
   */
  static fromLayout(rows: readonly string[]): Grid {
    const height = rows.length;
    const width = rows[0]?.length ?? 0;
    if (height === 0 || width === 0) {
      throw new Error("Layout must have at least one row and one column");
    }

    const grid = new Grid(width, height);
    rows.forEach((row, i) => {
      if (row.length !== width) {
        throw new Error("All rows in the layout must have the same length");
      }
      const y = height - 1 - i;
      for (let x = 0; x < width; x++) {
        const ch = row[x];
        if (ch === ".") continue;
        const type = CHAR_TO_TYPE.get(ch);
        if (type === undefined) throw new Error(`Unknown layout character '${ch}'`);
        grid.spawn(type, x, y);
      }
    });
    return grid;
  }

  /** Build a grid from a column-major type layout (`types[x][y]`). */
  static fromTypes(types: readonly (readonly TileType[])[]): Grid {
    const grid = new Grid(types.length, types[0]?.length ?? 0);
    types.forEach((column, x) => column.forEach((type, y) => grid.spawn(type, x, y)));
    return grid;
  }

  /** Inverse of `fromLayout`. */
  toLayout(): string[] {
    const rows: string[] = [];
    for (let y = this.height - 1; y >= 0; y--) {
      let row = "";
      for (let x = 0; x < this.width; x++) {
        const tile = this.cells[x][y];
        row += tile ? TYPE_TO_CHAR[tile.type] : ".";
      }
      rows.push(row);
    }
    return rows;
  }

  isValid(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  get(x: number, y: number): Tile | null {
    this.assertValid(x, y);
    return this.cells[x][y];
  }

  /** Lenient read for scans: out-of-bounds cells read as empty. */
  at(x: number, y: number): Tile | null {
    return this.isValid(x, y) ? this.cells[x][y] : null;
  }

  set(x: number, y: number, tile: Tile): void {
    this.assertValid(x, y);
    if (this.isValid(tile.x, tile.y) && this.cells[tile.x][tile.y] === tile) {
      this.cells[tile.x][tile.y] = null;
    }
    this.cells[x][y] = tile;
    tile.x = x;
    tile.y = y;
  }

  clear(x: number, y: number): void {
    this.assertValid(x, y);
    this.cells[x][y] = null;
  }

  /** Remove `tile` from its recorded slot. Stale references are ignored. */
  remove(tile: Tile): boolean {
    if (!this.contains(tile)) return false;
    this.cells[tile.x][tile.y] = null;
    return true;
  }

  contains(tile: Tile): boolean {
    return this.at(tile.x, tile.y) === tile;
  }

  /** Exchange two adjacent tiles' slots and coordinates in one step. */
  swap(a: Tile, b: Tile): void {
    if (!this.contains(a) || !this.contains(b)) {
      throw new InvalidCommandError("empty-cell", `Cannot swap ${a} and ${b}: stale tile`);
    }
    if (!this.areAdjacent(a, b)) {
      throw new InvalidCommandError("not-adjacent", `Cannot swap ${a} and ${b}: not adjacent`);
    }
    const { x: ax, y: ay } = a;
    this.cells[b.x][b.y] = a;
    this.cells[ax][ay] = b;
    a.x = b.x;
    a.y = b.y;
    b.x = ax;
    b.y = ay;
  }

  /** Relocate a tile onto an empty cell. */
  move(tile: Tile, x: number, y: number): void {
    this.assertValid(x, y);
    const occupant = this.cells[x][y];
    if (occupant && occupant !== tile) {
      throw new InvalidCommandError("empty-cell", `Cannot move ${tile} onto occupied cell (${x}, ${y})`);
    }
    this.remove(tile);
    this.cells[x][y] = tile;
    tile.x = x;
    tile.y = y;
  }

  /** Create a tile of `type` at an empty cell. */
  spawn(type: TileType, x: number, y: number): Tile {
    this.assertValid(x, y);
    if (this.cells[x][y]) {
      throw new InvalidCommandError("empty-cell", `Cannot spawn onto occupied cell (${x}, ${y})`);
    }
    const tile = new Tile(this.nextTileId++, type, x, y);
    this.cells[x][y] = tile;
    return tile;
  }

  /** Manhattan distance exactly 1; diagonals are not adjacent. */
  areAdjacent(a: GridPosition, b: GridPosition): boolean {
    return Math.abs(a.x - b.x) + Math.abs(a.y - b.y) === 1;
  }

  countEmptyInColumn(x: number): number {
    this.assertValid(x, 0);
    return this.cells[x].reduce((n, tile) => (tile ? n : n + 1), 0);
  }

  /** Live tiles, column by column, bottom-up. */
  *tiles(): IterableIterator<Tile> {
    for (let x = 0; x < this.width; x++) {
      for (let y = 0; y < this.height; y++) {
        const tile = this.cells[x][y];
        if (tile) yield tile;
      }
    }
  }

  private assertValid(x: number, y: number): void {
    if (!this.isValid(x, y)) throw new OutOfBoundsError(x, y);
  }
}
