import type { Grid } from "../game/Grid";
import type { Tile } from "../game/Tile";
import type { SpawnOperation, TileType } from "../types";
import { randomTileType } from "./random";
import type { Rng } from "./random";

/** Empty cells, column by column, ranked bottom-to-top within a column. */
export function computeSpawnOperations(grid: Grid): SpawnOperation[] {
  const spawns: SpawnOperation[] = [];

  for (let x = 0; x < grid.width; x++) {
    let spawnRank = 0;
    for (let y = 0; y < grid.height; y++) {
      if (!grid.at(x, y)) {
        spawns.push({ x, y, spawnRank: spawnRank++ });
      }
    }
  }

  return spawns;
}

/** Fill each spawn cell with a uniformly random type from `colors`. */
export function applySpawnOperations(
  grid: Grid,
  spawns: readonly SpawnOperation[],
  colors: readonly TileType[],
  rng: Rng,
): Tile[] {
  return spawns.map((spawn) => grid.spawn(randomTileType(rng, colors), spawn.x, spawn.y));
}
