import { DEFAULT_MAX_CASCADE_DEPTH, GRID_COLS, GRID_ROWS } from "./constants";
import { ConfigError } from "./errors";
import { COLORED_TILE_TYPES, POWER_UP_TILE_TYPES, TileType, isColoredType, isPowerUpType } from "./types";
import type { LogLevel } from "./utils/log";

export interface EngineOptions {
  width?: number;
  height?: number;
  /** Colored types used for the starting board and refills. */
  colors?: readonly TileType[];
  /** Power-up types that may be spawned. A missing one makes its spawns fail. */
  powerUps?: readonly TileType[];
  maxCascadeDepth?: number;
  /** Seed for every random draw; the same seed replays the same game. */
  seed?: number;
  logLevel?: LogLevel;
}

export interface EngineConfig {
  width: number;
  height: number;
  colors: readonly TileType[];
  powerUps: ReadonlySet<TileType>;
  maxCascadeDepth: number;
  seed: number | undefined;
  logLevel: LogLevel;
}

function assertPositiveInt(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
}

/** Fill in defaults and validate. Throws ConfigError on bad options. */
export function resolveEngineConfig(options: EngineOptions = {}): EngineConfig {
  const width = options.width ?? GRID_COLS;
  const height = options.height ?? GRID_ROWS;
  assertPositiveInt("width", width);
  assertPositiveInt("height", height);

  const colors = [...new Set(options.colors ?? COLORED_TILE_TYPES)];
  if (colors.length === 0) {
    throw new ConfigError("at least one colored tile type is required");
  }
  for (const t of colors) {
    if (!isColoredType(t)) throw new ConfigError(`${TileType[t] ?? t} is not a colored tile type`);
  }

  const powerUps = new Set(options.powerUps ?? POWER_UP_TILE_TYPES);
  for (const t of powerUps) {
    if (!isPowerUpType(t)) throw new ConfigError(`${TileType[t] ?? t} is not a power-up tile type`);
  }

  const maxCascadeDepth = options.maxCascadeDepth ?? DEFAULT_MAX_CASCADE_DEPTH;
  if (!Number.isInteger(maxCascadeDepth) || maxCascadeDepth < 0) {
    throw new ConfigError(`maxCascadeDepth must be a non-negative integer, got ${maxCascadeDepth}`);
  }

  if (options.seed !== undefined && !Number.isFinite(options.seed)) {
    throw new ConfigError(`seed must be a finite number, got ${options.seed}`);
  }

  return {
    width,
    height,
    colors,
    powerUps,
    maxCascadeDepth,
    seed: options.seed,
    logLevel: options.logLevel ?? "warn",
  };
}
