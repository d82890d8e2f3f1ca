import { describe, expect, it } from "vitest";
import { InvalidCommandError, OutOfBoundsError } from "../errors";
import { TileType } from "../types";
import { Grid } from "./Grid";
import type { Tile } from "./Tile";

function tileAt(grid: Grid, x: number, y: number): Tile {
  const tile = grid.get(x, y);
  if (!tile) throw new Error(`expected a tile at (${x}, ${y})`);
  return tile;
}

describe("Grid.fromLayout", () => {
  it("reads the first row as the top of the board", () => {
    const grid = Grid.fromLayout(["RG", "HB"]);
    expect(grid.width).toBe(2);
    expect(grid.height).toBe(2);
    expect(tileAt(grid, 0, 1).type).toBe(TileType.Red);
    expect(tileAt(grid, 1, 1).type).toBe(TileType.Green);
    expect(tileAt(grid, 0, 0).type).toBe(TileType.RocketHorizontal);
    expect(tileAt(grid, 1, 0).type).toBe(TileType.Blue);
  });

  it("round-trips through toLayout, keeping empties", () => {
    const rows = ["R.L", "VSY"];
    expect(Grid.fromLayout(rows).toLayout()).toEqual(rows);
  });

  it("rejects ragged rows and unknown characters", () => {
    expect(() => Grid.fromLayout(["RR", "R"])).toThrow("same length");
    expect(() => Grid.fromLayout(["RX"])).toThrow("Unknown layout character 'X'");
    expect(() => Grid.fromLayout([])).toThrow();
  });

  it("gives every tile a distinct id", () => {
    const grid = Grid.fromLayout(["RGB", "YRG"]);
    const ids = [...grid.tiles()].map((t) => t.id);
    expect(new Set(ids).size).toBe(6);
  });
});

describe("Grid reads", () => {
  const grid = Grid.fromLayout(["R.", "GB"]);

  it("isValid never throws", () => {
    expect(grid.isValid(0, 0)).toBe(true);
    expect(grid.isValid(2, 0)).toBe(false);
    expect(grid.isValid(0, -1)).toBe(false);
    expect(grid.isValid(0.5, 0)).toBe(false);
  });

  it("get throws OutOfBoundsError outside the board", () => {
    expect(() => grid.get(2, 0)).toThrow(OutOfBoundsError);
    expect(grid.get(1, 1)).toBeNull();
  });

  it("at reads out-of-bounds cells as empty", () => {
    expect(grid.at(-1, 0)).toBeNull();
    expect(grid.at(0, 1)?.type).toBe(TileType.Red);
  });

  it("counts empty cells per column", () => {
    expect(grid.countEmptyInColumn(0)).toBe(0);
    expect(grid.countEmptyInColumn(1)).toBe(1);
  });

  it("iterates tiles column by column, bottom-up", () => {
    expect([...grid.tiles()].map((t) => t.type)).toEqual([TileType.Green, TileType.Red, TileType.Blue]);
  });
});

describe("Grid writes", () => {
  it("swap exchanges slots and coordinates", () => {
    const grid = Grid.fromLayout(["RG"]);
    const red = tileAt(grid, 0, 0);
    const green = tileAt(grid, 1, 0);

    grid.swap(red, green);

    expect(red.x).toBe(1);
    expect(green.x).toBe(0);
    expect(grid.get(1, 0)).toBe(red);
    expect(grid.get(0, 0)).toBe(green);
  });

  it("swap refuses tiles that are not adjacent", () => {
    const grid = Grid.fromLayout(["RG", "BY"]);
    const err = (() => {
      try {
        grid.swap(tileAt(grid, 0, 0), tileAt(grid, 1, 1));
      } catch (e) {
        return e;
      }
      return null;
    })();
    expect(err).toBeInstanceOf(InvalidCommandError);
    expect(err).toMatchObject({ reason: "not-adjacent", code: "INVALID_COMMAND" });
  });

  it("set moves a tile and frees its old slot", () => {
    const grid = Grid.fromLayout(["R."]);
    const red = tileAt(grid, 0, 0);
    grid.set(1, 0, red);
    expect(grid.get(0, 0)).toBeNull();
    expect(grid.get(1, 0)).toBe(red);
    expect(red.x).toBe(1);
    expect(() => grid.set(5, 0, red)).toThrow(OutOfBoundsError);
  });

  it("move refuses an occupied target", () => {
    const grid = Grid.fromLayout(["R", "G"]);
    expect(() => grid.move(tileAt(grid, 0, 1), 0, 0)).toThrow(InvalidCommandError);
  });

  it("spawn refuses an occupied cell", () => {
    const grid = Grid.fromLayout(["R"]);
    expect(() => grid.spawn(TileType.Blue, 0, 0)).toThrow(InvalidCommandError);
  });

  it("remove ignores stale references", () => {
    const grid = Grid.fromLayout(["RG"]);
    const red = tileAt(grid, 0, 0);
    expect(grid.remove(red)).toBe(true);
    expect(grid.remove(red)).toBe(false);
    expect(grid.contains(red)).toBe(false);
    expect(grid.toLayout()).toEqual([".G"]);
  });

  it("clear empties a cell", () => {
    const grid = Grid.fromLayout(["RG"]);
    grid.clear(1, 0);
    expect(grid.toLayout()).toEqual(["R."]);
  });
});

describe("Grid.areAdjacent", () => {
  const grid = new Grid(3, 3);

  it("accepts orthogonal neighbors only", () => {
    expect(grid.areAdjacent({ x: 1, y: 1 }, { x: 1, y: 2 })).toBe(true);
    expect(grid.areAdjacent({ x: 1, y: 1 }, { x: 0, y: 1 })).toBe(true);
    expect(grid.areAdjacent({ x: 1, y: 1 }, { x: 2, y: 2 })).toBe(false);
    expect(grid.areAdjacent({ x: 1, y: 1 }, { x: 1, y: 1 })).toBe(false);
  });
});
