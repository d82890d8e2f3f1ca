/** Default grid dimensions */
export const GRID_COLS = 8;
export const GRID_ROWS = 8;

/** Match shapes (fixed) */
export const MIN_MATCH = 3;
export const POWER_UP_MATCH = 4;
export const SQUARE_SIZE = 2;

/** Cascade safety valve */
export const DEFAULT_MAX_CASCADE_DEPTH = 50;

/** Extra random cells hit by a snitch blast */
export const SNITCH_RANDOM_CELLS = 1;
export const LUCKY_SNITCH_RANDOM_CELLS = 2;

/** Chance that a square match spawns the lucky snitch variant */
export const LUCKY_SNITCH_CHANCE = 0.5;

/** Retries when generating a starting board that has a valid move */
export const MAX_GENERATION_ATTEMPTS = 100;

/** Animation durations used by the ticker-driven host (seconds) */
export const SWAP_DURATION = 0.2;
export const FALL_DURATION = 0.15; // per cell
export const FALL_DELAY_PER_ROW = 0.05;
export const DESTROY_DURATION = 0.25;
export const SPAWN_DURATION = 0.15;
export const CHAIN_DELAY = 0.1; // added per chain generation before a wave animates
