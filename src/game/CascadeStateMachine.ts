import { resolveEngineConfig } from "../config";
import type { EngineConfig, EngineOptions } from "../config";
import { MAX_GENERATION_ATTEMPTS } from "../constants";
import { ConfigError } from "../errors";
import type { InvalidCommandReason } from "../errors";
import { GameState } from "../types";
import type { GridPosition, SwapRequest } from "../types";
import { applyFallOperations, computeFallOperations, groupFallsBySourceRow } from "../utils/gravity";
import { createLogger } from "../utils/log";
import type { Logger } from "../utils/log";
import { findAllMatches, findMatchesAt, findValidMove, hasValidMoves } from "../utils/matching";
import { createRng, generateGrid } from "../utils/random";
import type { Rng } from "../utils/random";
import { applySpawnOperations, computeSpawnOperations } from "../utils/refill";
import { BlastResolver } from "./BlastResolver";
import type { BlastSeed } from "./BlastResolver";
import type { AnimationBatch, BatchPhase, EngineListener } from "./events";
import { Grid } from "./Grid";
import type { Tile } from "./Tile";

export type CommandResult = { accepted: true } | { accepted: false; reason: InvalidCommandReason };

export interface CascadeOptions extends EngineOptions {
  listener?: EngineListener;
  /** Shared RNG; defaults to one seeded from `seed`. */
  rng?: Rng;
}

const ACCEPTED: CommandResult = { accepted: true };

/**
 * Drives one board through Swap → Blast → Gravity → Refill → Cascade.
 *
 * Every structural change is applied to the grid at once and announced as an
 * AnimationBatch. The machine moves to the next phase only after the host has
 * called `complete` for every batch of the current one. Completions made from
 * inside a listener callback are queued and handled once the current step
 * returns, so a host may complete batches synchronously.
 */
export class CascadeStateMachine {
  readonly grid: Grid;
  readonly config: EngineConfig;
  private readonly rng: Rng;
  private readonly log: Logger;
  private readonly resolver: BlastResolver;
  private listener: EngineListener;

  private _state = GameState.Idle;
  private _cascadeDepth = 0;

  private nextBatchId = 1;
  private readonly pending = new Map<number, AnimationBatch>();
  private readonly completed: number[] = [];
  private continuation: (() => void) | null = null;
  private busy = false;

  constructor(grid: Grid, options: CascadeOptions = {}) {
    this.grid = grid;
    this.config = resolveEngineConfig({ ...options, width: grid.width, height: grid.height });
    this.rng = options.rng ?? createRng(this.config.seed);
    this.log = createLogger("CascadeStateMachine", this.config.logLevel);
    this.listener = options.listener ?? {};
    this.resolver = new BlastResolver(grid, {
      powerUps: this.config.powerUps,
      rng: this.rng,
      log: createLogger("BlastResolver", this.config.logLevel),
    });
  }

  get state(): GameState {
    return this._state;
  }

  get cascadeDepth(): number {
    return this._cascadeDepth;
  }

  /** Batches announced but not yet completed by the host. */
  get pendingBatches(): AnimationBatch[] {
    return [...this.pending.values()];
  }

  setListener(listener: EngineListener): void {
    this.listener = listener;
  }

  /** Best swap available right now, or `null`. */
  hint(): SwapRequest | null {
    return findValidMove(this.grid);
  }

  // ─── Commands ──────────────────────────────────────────────────────

  requestSwap(a: GridPosition, b: GridPosition): CommandResult {
    if (this._state !== GameState.Idle) return this.reject("not-idle", "Swap rejected - game not idle");
    if (!this.grid.isValid(a.x, a.y) || !this.grid.isValid(b.x, b.y)) {
      return this.reject("out-of-bounds", `Swap rejected - (${a.x},${a.y}) to (${b.x},${b.y}) is off the board`);
    }
    const tileA = this.grid.get(a.x, a.y);
    const tileB = this.grid.get(b.x, b.y);
    if (!tileA || !tileB) return this.reject("empty-cell", "Swap rejected - empty cell");
    if (!this.grid.areAdjacent(tileA, tileB)) {
      return this.reject("not-adjacent", `Swap rejected - ${tileA} and ${tileB} are not adjacent`);
    }
    if (tileA.moving || tileB.moving) return this.reject("tile-moving", "Swap rejected - tile still moving");

    this.step(() => {
      this._cascadeDepth = 0;
      this.setState(GameState.Swapping);
      this.grid.swap(tileA, tileB);
      const batch = this.issue("swap", [tileA, tileB]);
      this.listener.onSwapStarted?.(tileA, tileB, batch);
      this.afterBatches(() => this.finishSwap(tileA, tileB));
    });
    return ACCEPTED;
  }

  activatePowerUp(x: number, y: number): CommandResult {
    if (this._state !== GameState.Idle) return this.reject("not-idle", "Activation rejected - game not idle");
    if (!this.grid.isValid(x, y)) return this.reject("out-of-bounds", `Activation rejected - (${x},${y}) is off the board`);
    const tile = this.grid.get(x, y);
    if (!tile) return this.reject("empty-cell", `Activation rejected - (${x},${y}) is empty`);
    if (!tile.isPowerUp) return this.reject("not-power-up", `Activation rejected - ${tile} is not a power-up`);
    if (tile.moving) return this.reject("tile-moving", `Activation rejected - ${tile} still moving`);

    this.step(() => {
      this._cascadeDepth = 0;
      this.listener.onPowerUpActivated?.(tile);
      this.blast([{ kind: "activation", tile }]);
    });
    return ACCEPTED;
  }

  /** Host callback: the animation for `batchId` finished. */
  complete(batchId: number): boolean {
    if (!this.pending.has(batchId) || this.completed.includes(batchId)) return false;
    this.completed.push(batchId);
    this.step(() => {});
    return true;
  }

  /** Complete every pending batch, including ones issued meanwhile, until none remain. */
  flush(): void {
    this.step(() => {
      while (this.pending.size > 0) {
        for (const id of this.pending.keys()) {
          if (!this.completed.includes(id)) this.completed.push(id);
        }
        this.drain();
      }
    });
  }

  // ─── Phases ────────────────────────────────────────────────────────

  private finishSwap(a: Tile, b: Tile): void {
    const matches = findMatchesAt(this.grid, { x: a.x, y: a.y }, { x: b.x, y: b.y });
    if (matches.length > 0) {
      this.blast(matches.map((match): BlastSeed => ({ kind: "match", match })));
      return;
    }

    this.grid.swap(a, b);
    const batch = this.issue("revert", [a, b]);
    this.log.debug("Swap reverted - no matches found");
    this.listener.onSwapReverted?.(a, b, batch);
    this.afterBatches(() => this.enterIdle());
  }

  private blast(seeds: readonly BlastSeed[]): void {
    this.setState(GameState.Blasting);
    for (const seed of seeds) {
      if (seed.kind === "match") this.listener.onMatchFound?.(seed.match);
    }

    const result = this.resolver.resolve(seeds);
    for (const wave of result.waves) {
      const batch = this.issue("blast", wave.tiles);
      this.listener.onItemsBlasted?.(wave.tiles, wave, batch);
    }
    for (const spawned of result.spawned) {
      this.listener.onPowerUpSpawned?.(spawned);
    }
    for (const error of result.errors) {
      this.listener.onError?.(error);
    }
    this.log.debug(`Blasted ${result.removed.length} tiles in ${result.waves.length} waves`);

    this.afterBatches(() => {
      this.listener.onBlastCompleted?.();
      this.applyGravity();
    });
  }

  private applyGravity(): void {
    this.setState(GameState.Gravity);
    const falls = computeFallOperations(this.grid);
    applyFallOperations(this.grid, falls);

    const rows = groupFallsBySourceRow(falls);
    const batch = falls.length > 0 ? this.issue("gravity", falls.map((f) => f.tile)) : null;
    this.listener.onGravityStarted?.(rows, batch);
    for (const row of rows) {
      for (const fall of row) this.listener.onTileFell?.(fall);
    }

    this.afterBatches(() => {
      this.listener.onGravityCompleted?.();
      this.refill();
    });
  }

  private refill(): void {
    this.setState(GameState.Refilling);
    const spawns = computeSpawnOperations(this.grid);
    const tiles = applySpawnOperations(this.grid, spawns, this.config.colors, this.rng);

    const batch = tiles.length > 0 ? this.issue("refill", tiles) : null;
    this.listener.onRefillStarted?.(spawns, batch);
    spawns.forEach((spawn, i) => this.listener.onTileSpawned?.(tiles[i], spawn));

    this.afterBatches(() => {
      this.listener.onRefillCompleted?.();
      this.checkCascade();
    });
  }

  private checkCascade(): void {
    this.setState(GameState.Cascading);
    const matches = findAllMatches(this.grid);
    if (matches.length === 0) {
      this.log.debug(`No cascade matches. Total cascades: ${this._cascadeDepth}`);
      this.enterIdle();
      return;
    }

    this._cascadeDepth++;
    if (this._cascadeDepth > this.config.maxCascadeDepth) {
      this.log.warn(`Max cascade depth (${this.config.maxCascadeDepth}) reached!`);
      this.listener.onCascadeLimitReached?.(this._cascadeDepth);
      this.enterIdle();
      return;
    }

    this.blast(matches.map((match): BlastSeed => ({ kind: "match", match })));
  }

  private enterIdle(): void {
    this._cascadeDepth = 0;
    const stuck = !hasValidMoves(this.grid);
    this.setState(GameState.Idle);
    if (stuck) {
      this.log.info("No valid moves left");
      this.listener.onNoValidMoves?.();
    }
  }

  // ─── Batch bookkeeping ─────────────────────────────────────────────

  private setState(state: GameState): void {
    if (this._state === state) return;
    const previous = this._state;
    this._state = state;
    this.log.debug(`State changed to: ${state}`);
    this.listener.onGameStateChanged?.(state, previous);
  }

  private reject(reason: InvalidCommandReason, message: string): CommandResult {
    this.log.warn(message);
    return { accepted: false, reason };
  }

  private issue(phase: BatchPhase, tiles: readonly Tile[]): AnimationBatch {
    const batch: AnimationBatch = { id: this.nextBatchId++, phase, tiles: [...tiles] };
    for (const t of tiles) t.moving = true;
    this.pending.set(batch.id, batch);
    return batch;
  }

  /** Run `next` once the current phase's batches are all complete. */
  private afterBatches(next: () => void): void {
    if (this.pending.size === 0) {
      next();
    } else {
      this.continuation = next;
    }
  }

  private step(action: () => void): void {
    if (this.busy) {
      action();
      return;
    }
    this.busy = true;
    try {
      action();
      this.drain();
    } finally {
      this.busy = false;
    }
  }

  private drain(): void {
    for (let id = this.completed.shift(); id !== undefined; id = this.completed.shift()) {
      const batch = this.pending.get(id);
      if (!batch) continue;
      this.pending.delete(id);
      for (const t of batch.tiles) t.moving = false;

      if (this.pending.size === 0 && this.continuation) {
        const next = this.continuation;
        this.continuation = null;
        next();
      }
    }
  }
}

/**
 * Build an engine on a freshly generated board with no matches and at least
 * one valid move. All draws come from one RNG seeded with `options.seed`.
 */
export function createEngine(options: CascadeOptions = {}): CascadeStateMachine {
  const config = resolveEngineConfig(options);
  const rng = options.rng ?? createRng(config.seed);

  for (let attempt = 0; attempt < MAX_GENERATION_ATTEMPTS; attempt++) {
    const grid = Grid.fromTypes(generateGrid(config.width, config.height, config.colors, rng));
    if (findAllMatches(grid).length === 0 && hasValidMoves(grid)) {
      return new CascadeStateMachine(grid, { ...options, rng });
    }
  }

  throw new ConfigError(`Unable to generate a ${config.width}x${config.height} starting board with a valid move`);
}
