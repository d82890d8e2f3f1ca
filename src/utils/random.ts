import { MIN_MATCH } from "../constants";
import type { TileType } from "../types";

/**
 * Seedable RNG (mulberry32). The same seed replays the same sequence, which
 * makes whole cascades reproducible.
 */
export interface Rng {
  /** Float in [0, 1). */
  next(): number;
  /** Integer in [0, max). */
  int(max: number): number;
  getState(): number;
}

export function createRng(seed?: number): Rng {
  let state = seed ?? (Math.floor(Math.random() * 0xffffffff) >>> 0);
  state >>>= 0;
  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t = (t + Math.imul(t ^ (t >>> 7), t | 61)) >>> 0;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
  return {
    next,
    int: (max) => Math.floor(next() * max),
    getState: () => state,
  };
}

/** Pick one element uniformly. `items` must not be empty. */
export function pick<T>(rng: Rng, items: readonly T[]): T {
  return items[rng.int(items.length)];
}

/** Pick a random tile type from `colors`, optionally excluding some. */
export function randomTileType(rng: Rng, colors: readonly TileType[], exclude?: Set<TileType>): TileType {
  const allowed = exclude ? colors.filter((t) => !exclude.has(t)) : colors;
  return pick(rng, allowed.length > 0 ? allowed : colors);
}

/**
 * Generate a column-major type layout (`layout[x][y]`) with no pre-existing
 * matches: when placing a tile, forbid the types that would complete a run of
 * MIN_MATCH to the left or below, or close a 2x2 square with the cells to
 * the left and below.
 */
export function generateGrid(
  width: number,
  height: number,
  colors: readonly TileType[],
  rng: Rng,
): TileType[][] {
  const layout: TileType[][] = [];

  for (let x = 0; x < width; x++) {
    layout[x] = [];
    for (let y = 0; y < height; y++) {
      const forbidden = new Set<TileType>();

      if (x >= MIN_MATCH - 1) {
        const t = layout[x - 1][y];
        if (t === layout[x - 2][y]) forbidden.add(t);
      }

      if (y >= MIN_MATCH - 1) {
        const t = layout[x][y - 1];
        if (t === layout[x][y - 2]) forbidden.add(t);
      }

      if (x >= 1 && y >= 1) {
        const t = layout[x - 1][y];
        if (t === layout[x][y - 1] && t === layout[x - 1][y - 1]) forbidden.add(t);
      }

      layout[x][y] = randomTileType(rng, colors, forbidden);
    }
  }

  return layout;
}
