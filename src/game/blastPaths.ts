import { LUCKY_SNITCH_RANDOM_CELLS, SNITCH_RANDOM_CELLS } from "../constants";
import { TileType } from "../types";
import type { Rng } from "../utils/random";
import type { Grid } from "./Grid";
import type { Tile } from "./Tile";

const ORTHOGONAL: ReadonlyArray<readonly [number, number]> = [
  [0, 1],
  [0, -1],
  [-1, 0],
  [1, 0],
];

/**
 * Tiles destroyed when `tile` is activated, read against the grid as it is
 * now. The activated tile is always the first entry.
 */
export function computeBlastPath(grid: Grid, tile: Tile, rng: Rng): Tile[] {
  switch (tile.type) {
    case TileType.RocketHorizontal:
      return rocketPath(grid, tile, 1, 0);
    case TileType.RocketVertical:
      return rocketPath(grid, tile, 0, 1);
    case TileType.Snitch:
      return snitchPath(grid, tile, SNITCH_RANDOM_CELLS, rng);
    case TileType.SnitchLucky:
      return snitchPath(grid, tile, LUCKY_SNITCH_RANDOM_CELLS, rng);
    case TileType.Red:
    case TileType.Yellow:
    case TileType.Green:
    case TileType.Blue:
      return [tile];
  }
}

/** Every occupied cell of the rocket's row (dx = 1) or column (dy = 1). */
function rocketPath(grid: Grid, rocket: Tile, dx: number, _dy: number): Tile[] {
  const path: Tile[] = [rocket];
  const length = dx === 1 ? grid.width : grid.height;
  for (let i = 0; i < length; i++) {
    const t = dx === 1 ? grid.at(i, rocket.y) : grid.at(rocket.x, i);
    if (t && t !== rocket) path.push(t);
  }
  return path;
}

/** The snitch, its four neighbors, then `extra` random occupied cells. */
function snitchPath(grid: Grid, snitch: Tile, extra: number, rng: Rng): Tile[] {
  const path: Tile[] = [snitch];
  const selected = new Set<Tile>(path);

  for (const [dx, dy] of ORTHOGONAL) {
    const t = grid.at(snitch.x + dx, snitch.y + dy);
    if (t && !selected.has(t)) {
      path.push(t);
      selected.add(t);
    }
  }

  const available: Tile[] = [];
  for (const t of grid.tiles()) {
    if (!selected.has(t)) available.push(t);
  }
  for (let i = 0; i < extra && available.length > 0; i++) {
    const [t] = available.splice(rng.int(available.length), 1);
    path.push(t);
  }

  return path;
}
