import type { Grid } from "../game/Grid";
import type { Tile } from "../game/Tile";

export interface FallOperation {
  tile: Tile;
  x: number;
  fromY: number;
  /** Always below `fromY`. */
  toY: number;
  distance: number;
}

/**
 * Compact every column toward y = 0, keeping vertical order. Columns are
 * scanned bottom-up with a running count of empties; an occupied cell above
 * `n` empties falls by `n`.
 */
export function computeFallOperations(grid: Grid): FallOperation[] {
  const falls: FallOperation[] = [];

  for (let x = 0; x < grid.width; x++) {
    let emptyCount = 0;
    for (let y = 0; y < grid.height; y++) {
      const tile = grid.at(x, y);
      if (!tile) {
        emptyCount++;
      } else if (emptyCount > 0) {
        falls.push({ tile, x, fromY: y, toY: y - emptyCount, distance: emptyCount });
      }
    }
  }

  return falls;
}

/**
 * Apply falls in the order `computeFallOperations` produced them; within a
 * column the lower tile always moves first, so every target is empty.
 */
export function applyFallOperations(grid: Grid, falls: readonly FallOperation[]): void {
  for (const fall of falls) {
    grid.move(fall.tile, fall.x, fall.toY);
  }
}

/**
 * Falls grouped by source row, lowest row first. Animators start each row a
 * little after the one below it.
 */
export function groupFallsBySourceRow(falls: readonly FallOperation[]): FallOperation[][] {
  const groups = new Map<number, FallOperation[]>();
  for (const fall of falls) {
    const row = groups.get(fall.fromY);
    if (row) row.push(fall);
    else groups.set(fall.fromY, [fall]);
  }
  return [...groups.entries()].sort(([a], [b]) => a - b).map(([, row]) => row);
}
