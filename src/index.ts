export { AnimationDriver, DEFAULT_TIMINGS } from "./game/AnimationDriver";
export type { AnimationDriverOptions, AnimationTimings } from "./game/AnimationDriver";
export { Animator, easeOutQuad } from "./game/Animator";
export type { Easing } from "./game/Animator";
export { BlastResolver } from "./game/BlastResolver";
export type { BlastResult, BlastResolverOptions, BlastSeed, BlastWave, SpawnedPowerUp } from "./game/BlastResolver";
export { computeBlastPath } from "./game/blastPaths";
export { CascadeStateMachine, createEngine } from "./game/CascadeStateMachine";
export type { CascadeOptions, CommandResult } from "./game/CascadeStateMachine";
export { combineListeners } from "./game/events";
export type { AnimationBatch, BatchPhase, EngineListener } from "./game/events";
export { Grid } from "./game/Grid";
export { MatchData } from "./game/MatchData";
export { Tile } from "./game/Tile";

export { resolveEngineConfig } from "./config";
export type { EngineConfig, EngineOptions } from "./config";
export * from "./constants";
export { ConfigError, EngineError, InvalidCommandError, MissingAssetError, OutOfBoundsError } from "./errors";
export type { EngineErrorCode, InvalidCommandReason } from "./errors";
export {
  COLORED_TILE_TYPES,
  GameState,
  MatchOrientation,
  POWER_UP_TILE_TYPES,
  TileType,
  isColoredType,
  isPowerUpType,
  isRocketType,
  isSnitchType,
} from "./types";
export type { GridPosition, SpawnOperation, SwapRequest } from "./types";

export { applyFallOperations, computeFallOperations, groupFallsBySourceRow } from "./utils/gravity";
export type { FallOperation } from "./utils/gravity";
export { createLogger } from "./utils/log";
export type { LogLevel, Logger } from "./utils/log";
export { findAllMatches, findMatchesAt, findValidMove, hasValidMoves } from "./utils/matching";
export { createRng, generateGrid, pick, randomTileType } from "./utils/random";
export type { Rng } from "./utils/random";
export { applySpawnOperations, computeSpawnOperations } from "./utils/refill";
