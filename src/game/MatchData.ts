import { POWER_UP_MATCH } from "../constants";
import { MatchOrientation } from "../types";
import type { GridPosition } from "../types";
import type { Tile } from "./Tile";

/** One detected run or square. Immutable once built. */
export class MatchData {
  readonly tiles: readonly Tile[];
  readonly orientation: MatchOrientation;
  /** Cell that receives a spawned power-up (or the triggering swap cell). */
  readonly pivot: Readonly<GridPosition>;

  constructor(tiles: readonly Tile[], orientation: MatchOrientation, pivot: GridPosition) {
    this.tiles = Object.freeze([...new Set(tiles)]);
    this.orientation = orientation;
    this.pivot = Object.freeze({ x: pivot.x, y: pivot.y });
  }

  get count(): number {
    return this.tiles.length;
  }

  /** Linear run long enough to spawn a rocket. Squares never qualify. */
  get isPowerUpMatch(): boolean {
    return this.orientation !== MatchOrientation.Square && this.count >= POWER_UP_MATCH;
  }

  get isSnitchMatch(): boolean {
    return this.orientation === MatchOrientation.Square;
  }
}
