import { MIN_MATCH, SQUARE_SIZE } from "../constants";
import type { Grid } from "../game/Grid";
import { MatchData } from "../game/MatchData";
import type { Tile } from "../game/Tile";
import { MatchOrientation } from "../types";
import type { GridPosition, SwapRequest, TileType } from "../types";

/**
 * Scan the whole board. Squares are found first and claim their cells;
 * linear runs of MIN_MATCH or more are then found among the unclaimed
 * colored tiles, pivoting on the middle of the run.
 */
export function findAllMatches(grid: Grid): MatchData[] {
  const claimed = new Set<Tile>();
  const matches = findSquares(grid, null, claimed);

  const processedHorizontal = new Set<Tile>();
  const processedVertical = new Set<Tile>();
  for (let x = 0; x < grid.width; x++) {
    for (let y = 0; y < grid.height; y++) {
      collectLinear(grid, { x, y }, null, claimed, processedHorizontal, processedVertical, matches);
    }
  }

  return matches;
}

/**
 * Scan only the runs and squares through `positions` (the two cells of a
 * swap). Every match pivots on the seed that found it, so a power-up lands
 * on the swapped cell.
 */
export function findMatchesAt(grid: Grid, ...positions: GridPosition[]): MatchData[] {
  const claimed = new Set<Tile>();
  const matches = findSquares(grid, positions, claimed);

  const processedHorizontal = new Set<Tile>();
  const processedVertical = new Set<Tile>();
  for (const seed of positions) {
    collectLinear(grid, seed, seed, claimed, processedHorizontal, processedVertical, matches);
  }

  return matches;
}

function findSquares(grid: Grid, seeds: readonly GridPosition[] | null, claimed: Set<Tile>): MatchData[] {
  const squares: MatchData[] = [];

  const tryCorner = (x: number, y: number, pivot: GridPosition): void => {
    const tiles = squareAt(grid, x, y);
    if (!tiles || tiles.some((t) => claimed.has(t))) return;
    for (const t of tiles) claimed.add(t);
    squares.push(new MatchData(tiles, MatchOrientation.Square, pivot));
  };

  if (!seeds) {
    for (let x = 0; x <= grid.width - SQUARE_SIZE; x++) {
      for (let y = 0; y <= grid.height - SQUARE_SIZE; y++) {
        tryCorner(x, y, { x, y });
      }
    }
    return squares;
  }

  const checkedCorners = new Set<string>();
  for (const seed of seeds) {
    // The seed may be any of the four corners of a square.
    const corners: GridPosition[] = [
      { x: seed.x, y: seed.y },
      { x: seed.x - 1, y: seed.y },
      { x: seed.x, y: seed.y - 1 },
      { x: seed.x - 1, y: seed.y - 1 },
    ];
    for (const corner of corners) {
      const key = `${corner.x},${corner.y}`;
      if (checkedCorners.has(key)) continue;
      checkedCorners.add(key);
      tryCorner(corner.x, corner.y, seed);
    }
  }
  return squares;
}

/** The four tiles of a same-colored 2x2 block whose bottom-left is (x, y). */
function squareAt(grid: Grid, x: number, y: number): Tile[] | null {
  const bottomLeft = grid.at(x, y);
  if (!bottomLeft || !bottomLeft.isColored) return null;

  const tiles = [bottomLeft, grid.at(x + 1, y), grid.at(x, y + 1), grid.at(x + 1, y + 1)];
  const block: Tile[] = [];
  for (const t of tiles) {
    if (!t || t.type !== bottomLeft.type) return null;
    block.push(t);
  }
  return block;
}

function collectLinear(
  grid: Grid,
  at: GridPosition,
  seed: GridPosition | null,
  claimed: Set<Tile>,
  processedHorizontal: Set<Tile>,
  processedVertical: Set<Tile>,
  out: MatchData[],
): void {
  const tile = grid.at(at.x, at.y);
  if (!tile || !tile.isColored || claimed.has(tile)) return;

  if (!processedHorizontal.has(tile)) {
    const run = runThrough(grid, tile, 1, 0, claimed);
    if (run.length >= MIN_MATCH) {
      out.push(new MatchData(run, MatchOrientation.Horizontal, seed ?? middleOf(run)));
      for (const t of run) processedHorizontal.add(t);
    }
  }

  if (!processedVertical.has(tile)) {
    const run = runThrough(grid, tile, 0, 1, claimed);
    if (run.length >= MIN_MATCH) {
      out.push(new MatchData(run, MatchOrientation.Vertical, seed ?? middleOf(run)));
      for (const t of run) processedVertical.add(t);
    }
  }
}

/**
 * Maximal run of `tile.type` through `tile` along (dx, dy), ordered from the
 * low end. Claimed tiles end the run like a different type would.
 */
function runThrough(grid: Grid, tile: Tile, dx: number, dy: number, claimed: Set<Tile>): Tile[] {
  const type: TileType = tile.type;
  const continuesRun = (t: Tile | null): t is Tile => t !== null && t.type === type && !claimed.has(t);

  let x = tile.x;
  let y = tile.y;
  while (continuesRun(grid.at(x - dx, y - dy))) {
    x -= dx;
    y -= dy;
  }

  const run: Tile[] = [];
  for (let t = grid.at(x, y); continuesRun(t); t = grid.at(x, y)) {
    run.push(t);
    x += dx;
    y += dy;
  }
  return run;
}

function middleOf(run: readonly Tile[]): GridPosition {
  const pivot = run[Math.floor(run.length / 2)];
  return { x: pivot.x, y: pivot.y };
}

/**
 * True when the player has something to do: a power-up to activate, or an
 * adjacent swap that produces a match.
 */
export function hasValidMoves(grid: Grid): boolean {
  for (const tile of grid.tiles()) {
    if (tile.isPowerUp) return true;
  }
  return findValidMove(grid) !== null;
}

/**
 * Find the swap that matches the most tiles, trying each cell with its right
 * and upper neighbor. The grid is restored before returning.
 */
export function findValidMove(grid: Grid): SwapRequest | null {
  let best: SwapRequest | null = null;
  let bestLen = 0;

  for (let x = 0; x < grid.width; x++) {
    for (let y = 0; y < grid.height; y++) {
      const a = grid.at(x, y);
      if (!a) continue;

      for (const b of [grid.at(x + 1, y), grid.at(x, y + 1)]) {
        if (!b) continue;
        const posA = { x: a.x, y: a.y };
        const posB = { x: b.x, y: b.y };
        grid.swap(a, b);
        const matches = findMatchesAt(grid, posA, posB);
        grid.swap(a, b);

        const totalLen = matches.reduce((sum, m) => sum + m.count, 0);
        if (totalLen > bestLen) {
          bestLen = totalLen;
          best = { a: posA, b: posB };
        }
      }
    }
  }

  return best;
}
