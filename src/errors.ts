import type { TileType } from "./types";

export type EngineErrorCode = "OUT_OF_BOUNDS" | "INVALID_COMMAND" | "MISSING_ASSET" | "CONFIG";

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Grid access outside `[0, width) × [0, height)`. Guard with `Grid.isValid`. */
export class OutOfBoundsError extends EngineError {
  constructor(
    readonly x: number,
    readonly y: number,
  ) {
    super("OUT_OF_BOUNDS", `Cell (${x}, ${y}) is outside the grid`);
  }
}

export type InvalidCommandReason =
  | "not-idle"
  | "not-adjacent"
  | "tile-moving"
  | "empty-cell"
  | "out-of-bounds"
  | "not-power-up";

/**
 * A command the engine cannot honor right now. Commands report this as a
 * rejected `CommandResult`; the class is thrown only by low-level grid calls.
 */
export class InvalidCommandError extends EngineError {
  constructor(
    readonly reason: InvalidCommandReason,
    message: string,
  ) {
    super("INVALID_COMMAND", message);
  }
}

/** No tile type is registered for a requested spawn. */
export class MissingAssetError extends EngineError {
  constructor(
    readonly tileType: TileType,
    readonly x: number,
    readonly y: number,
  ) {
    super("MISSING_ASSET", `No tile registered for type ${tileType} (spawn at ${x}, ${y})`);
  }
}

export class ConfigError extends EngineError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}
