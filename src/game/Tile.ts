import { TileType, isColoredType, isPowerUpType } from "../types";

export class Tile {
  readonly id: number;
  readonly type: TileType;
  x: number;
  y: number;

  /**
   * True while an external animation for this tile is in flight. The engine
   * never starts a second structural operation on a moving tile.
   */
  moving = false;

  constructor(id: number, type: TileType, x: number, y: number) {
    this.id = id;
    this.type = type;
    this.x = x;
    this.y = y;
  }

  get isColored(): boolean {
    return isColoredType(this.type);
  }

  get isPowerUp(): boolean {
    return isPowerUpType(this.type);
  }

  toString(): string {
    return `${TileType[this.type]}#${this.id}(${this.x},${this.y})`;
  }
}
