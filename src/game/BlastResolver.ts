import { LUCKY_SNITCH_CHANCE } from "../constants";
import { MissingAssetError } from "../errors";
import { MatchOrientation, TileType } from "../types";
import type { GridPosition } from "../types";
import type { Logger } from "../utils/log";
import type { Rng } from "../utils/random";
import { computeBlastPath } from "./blastPaths";
import type { Grid } from "./Grid";
import type { MatchData } from "./MatchData";
import type { Tile } from "./Tile";

/** What starts a blast episode: a detected match or a clicked power-up. */
export type BlastSeed = { kind: "match"; match: MatchData } | { kind: "activation"; tile: Tile };

/** Tiles removed by one unit of work, in removal order. */
export interface BlastWave {
  /** The activated power-up, or `null` for a match. */
  source: Tile | null;
  tiles: Tile[];
  /** Chain generation: 0 for seeds, n + 1 for power-ups hit by generation n. */
  depth: number;
}

export interface SpawnedPowerUp {
  tile: Tile;
  /** The tile that was still in the cell and got replaced, if any. */
  replaced: Tile | null;
}

export interface BlastResult {
  waves: BlastWave[];
  removed: Tile[];
  spawned: SpawnedPowerUp[];
  errors: MissingAssetError[];
}

type SpawnKind = "rocket-horizontal" | "rocket-vertical" | "snitch";

interface SpawnTarget extends GridPosition {
  type: TileType;
}

type Unit =
  | { kind: "match"; match: MatchData; depth: number }
  | { kind: "activation"; source: Tile; path: Tile[]; depth: number };

export interface BlastResolverOptions {
  /** Power-up types that can be spawned; others fail with MissingAssetError. */
  powerUps: ReadonlySet<TileType>;
  rng: Rng;
  log: Logger;
}

/**
 * Expands matches and activations into the full set of destroyed tiles and
 * spawned power-ups. Work goes through one FIFO queue; a power-up destroyed
 * by a unit is activated as a new unit whose path is read before the unit's
 * tiles are removed. Each tile is destroyed at most once per episode.
 */
export class BlastResolver {
  private readonly grid: Grid;
  private readonly options: BlastResolverOptions;

  constructor(grid: Grid, options: BlastResolverOptions) {
    this.grid = grid;
    this.options = options;
  }

  resolve(seeds: readonly BlastSeed[]): BlastResult {
    const queue: Unit[] = seeds.map((seed) =>
      seed.kind === "match"
        ? { kind: "match", match: seed.match, depth: 0 }
        : { kind: "activation", source: seed.tile, path: this.pathOf(seed.tile), depth: 0 },
    );
    const processed = new Set<Tile>();
    const spawnTargets = new Map<string, SpawnTarget>();
    const result: BlastResult = { waves: [], removed: [], spawned: [], errors: [] };

    for (let unit = queue.shift(); unit; unit = queue.shift()) {
      const candidates = unit.kind === "match" ? this.classifyMatch(unit.match, spawnTargets, result) : unit.path;
      const origin = unit.kind === "activation" ? unit.source : null;

      const destroyed: Tile[] = [];
      for (const tile of candidates) {
        if (processed.has(tile) || !this.grid.contains(tile)) continue;
        processed.add(tile);
        destroyed.push(tile);
      }
      if (destroyed.length === 0) continue;

      // Chained power-ups read their paths before this batch leaves the grid.
      for (const tile of destroyed) {
        if (!tile.isPowerUp || tile === origin) continue;
        this.options.log.debug(`Chain: ${tile} hit at depth ${unit.depth}`);
        queue.push({ kind: "activation", source: tile, path: this.pathOf(tile), depth: unit.depth + 1 });
      }

      for (const tile of destroyed) this.grid.remove(tile);
      result.waves.push({ source: origin, tiles: destroyed, depth: unit.depth });
      result.removed.push(...destroyed);
    }

    for (const target of spawnTargets.values()) {
      this.spawnPowerUp(target, result);
    }

    return result;
  }

  /**
   * Register the match's spawn and return its destruction candidates. The
   * pivot tile of a spawning match is left in place to be replaced later;
   * when the spawn type is not registered the whole match is destroyed.
   */
  private classifyMatch(match: MatchData, spawnTargets: Map<string, SpawnTarget>, result: BlastResult): readonly Tile[] {
    let kind: SpawnKind | null = null;
    if (match.isSnitchMatch) {
      kind = "snitch";
    } else if (match.isPowerUpMatch) {
      kind = match.orientation === MatchOrientation.Horizontal ? "rocket-horizontal" : "rocket-vertical";
    }
    if (!kind) return match.tiles;

    const { x, y } = match.pivot;
    const key = `${x},${y}`;
    if (!spawnTargets.has(key)) {
      const type = this.resolveSpawnType(kind);
      if (!this.options.powerUps.has(type)) {
        const error = new MissingAssetError(type, x, y);
        this.options.log.error(`Spawn skipped: ${error.message}`);
        result.errors.push(error);
        return match.tiles;
      }
      spawnTargets.set(key, { x, y, type });
    }
    return match.tiles.filter((t) => t.x !== x || t.y !== y);
  }

  private pathOf(tile: Tile): Tile[] {
    return computeBlastPath(this.grid, tile, this.options.rng);
  }

  private spawnPowerUp(target: SpawnTarget, result: BlastResult): void {
    const { type } = target;
    const replaced = this.grid.at(target.x, target.y);
    if (replaced) this.grid.remove(replaced);
    const tile = this.grid.spawn(type, target.x, target.y);
    result.spawned.push({ tile, replaced });
  }

  /** Snitch variant is drawn once per nominated cell. */
  private resolveSpawnType(kind: SpawnKind): TileType {
    switch (kind) {
      case "rocket-horizontal":
        return TileType.RocketHorizontal;
      case "rocket-vertical":
        return TileType.RocketVertical;
      case "snitch":
        return this.options.rng.next() < LUCKY_SNITCH_CHANCE ? TileType.SnitchLucky : TileType.Snitch;
    }
  }
}
