import type { EngineError } from "../errors";
import type { GameState, SpawnOperation } from "../types";
import type { FallOperation } from "../utils/gravity";
import type { BlastWave, SpawnedPowerUp } from "./BlastResolver";
import type { MatchData } from "./MatchData";
import type { Tile } from "./Tile";

export type BatchPhase = "swap" | "revert" | "blast" | "gravity" | "refill";

/**
 * A set of structural changes already applied to the grid, waiting for the
 * host to animate them. Its tiles stay `moving` until the host calls
 * `complete(id)`.
 */
export interface AnimationBatch {
  readonly id: number;
  readonly phase: BatchPhase;
  readonly tiles: readonly Tile[];
}

/**
 * Everything the engine tells its host. All callbacks are optional. Within
 * one resolution cycle they fire in this order: matchFound, itemsBlasted,
 * blastCompleted, gravityStarted, tileFell, gravityCompleted, refillStarted,
 * tileSpawned, refillCompleted; gameStateChanged fires on every phase change.
 */
export interface EngineListener {
  onGameStateChanged?(state: GameState, previous: GameState): void;

  onSwapStarted?(a: Tile, b: Tile, batch: AnimationBatch): void;
  onSwapReverted?(a: Tile, b: Tile, batch: AnimationBatch): void;

  onMatchFound?(match: MatchData): void;
  onPowerUpActivated?(tile: Tile): void;
  onItemsBlasted?(tiles: readonly Tile[], wave: BlastWave, batch: AnimationBatch): void;
  onPowerUpSpawned?(spawned: SpawnedPowerUp): void;
  onBlastCompleted?(): void;

  /** `rows` groups the falls by source row, lowest first. */
  onGravityStarted?(rows: readonly (readonly FallOperation[])[], batch: AnimationBatch | null): void;
  onTileFell?(fall: FallOperation): void;
  onGravityCompleted?(): void;

  onRefillStarted?(spawns: readonly SpawnOperation[], batch: AnimationBatch | null): void;
  onTileSpawned?(tile: Tile, spawn: SpawnOperation): void;
  onRefillCompleted?(): void;

  onCascadeLimitReached?(depth: number): void;
  onNoValidMoves?(): void;
  /** Non-fatal failures such as a skipped spawn. */
  onError?(error: EngineError): void;
}

/** Fan one engine's events out to several listeners, in argument order. */
export function combineListeners(...listeners: EngineListener[]): EngineListener {
  return {
    onGameStateChanged: (...args) => listeners.forEach((l) => l.onGameStateChanged?.(...args)),
    onSwapStarted: (...args) => listeners.forEach((l) => l.onSwapStarted?.(...args)),
    onSwapReverted: (...args) => listeners.forEach((l) => l.onSwapReverted?.(...args)),
    onMatchFound: (...args) => listeners.forEach((l) => l.onMatchFound?.(...args)),
    onPowerUpActivated: (...args) => listeners.forEach((l) => l.onPowerUpActivated?.(...args)),
    onItemsBlasted: (...args) => listeners.forEach((l) => l.onItemsBlasted?.(...args)),
    onPowerUpSpawned: (...args) => listeners.forEach((l) => l.onPowerUpSpawned?.(...args)),
    onBlastCompleted: () => listeners.forEach((l) => l.onBlastCompleted?.()),
    onGravityStarted: (...args) => listeners.forEach((l) => l.onGravityStarted?.(...args)),
    onTileFell: (...args) => listeners.forEach((l) => l.onTileFell?.(...args)),
    onGravityCompleted: () => listeners.forEach((l) => l.onGravityCompleted?.()),
    onRefillStarted: (...args) => listeners.forEach((l) => l.onRefillStarted?.(...args)),
    onTileSpawned: (...args) => listeners.forEach((l) => l.onTileSpawned?.(...args)),
    onRefillCompleted: () => listeners.forEach((l) => l.onRefillCompleted?.()),
    onCascadeLimitReached: (...args) => listeners.forEach((l) => l.onCascadeLimitReached?.(...args)),
    onNoValidMoves: () => listeners.forEach((l) => l.onNoValidMoves?.()),
    onError: (...args) => listeners.forEach((l) => l.onError?.(...args)),
  };
}
