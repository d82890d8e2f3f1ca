export enum TileType {
  Red = 0,
  Yellow = 1,
  Green = 2,
  Blue = 3,
  RocketHorizontal = 4,
  RocketVertical = 5,
  Snitch = 6,
  SnitchLucky = 7,
}

/** Regular (matchable) tile colors, in enum order. */
export const COLORED_TILE_TYPES: readonly TileType[] = [
  TileType.Red,
  TileType.Yellow,
  TileType.Green,
  TileType.Blue,
];

export const POWER_UP_TILE_TYPES: readonly TileType[] = [
  TileType.RocketHorizontal,
  TileType.RocketVertical,
  TileType.Snitch,
  TileType.SnitchLucky,
];

export function isColoredType(t: TileType): boolean {
  return t === TileType.Red || t === TileType.Yellow || t === TileType.Green || t === TileType.Blue;
}

export function isRocketType(t: TileType): boolean {
  return t === TileType.RocketHorizontal || t === TileType.RocketVertical;
}

export function isSnitchType(t: TileType): boolean {
  return t === TileType.Snitch || t === TileType.SnitchLucky;
}

export function isPowerUpType(t: TileType): boolean {
  return isRocketType(t) || isSnitchType(t);
}

export enum MatchOrientation {
  Horizontal = "horizontal",
  Vertical = "vertical",
  /** 2x2 block; spawns a Snitch. */
  Square = "square",
}

/** Cascade phase. Only `Idle` accepts commands. */
export enum GameState {
  Idle = "idle",
  Swapping = "swapping",
  Blasting = "blasting",
  Gravity = "gravity",
  Refilling = "refilling",
  Cascading = "cascading",
}

/** Cell coordinate. `y = 0` is the low edge tiles fall toward. */
export interface GridPosition {
  x: number;
  y: number;
}

export interface SpawnOperation {
  x: number;
  y: number;
  /** Order among the empties of one column, 0 = lowest / first to fill. */
  spawnRank: number;
}

export interface SwapRequest {
  a: GridPosition;
  b: GridPosition;
}
