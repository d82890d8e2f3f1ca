import { describe, expect, it } from "vitest";
import { Grid } from "../game/Grid";
import { COLORED_TILE_TYPES, TileType } from "../types";
import { findAllMatches } from "./matching";
import { createRng, generateGrid, pick, randomTileType } from "./random";

describe("createRng", () => {
  it("replays the same sequence for the same seed", () => {
    const a = createRng(42);
    const b = createRng(42);
    const seqA = Array.from({ length: 5 }, () => a.next());
    const seqB = Array.from({ length: 5 }, () => b.next());
    expect(seqA).toEqual(seqB);
    expect(a.getState()).toBe(b.getState());
  });

  it("diverges for different seeds", () => {
    expect(createRng(1).next()).not.toBe(createRng(2).next());
  });

  it("keeps next() in [0, 1)", () => {
    const rng = createRng(1);
    for (let i = 0; i < 1000; i++) {
      const n = rng.next();
      expect(n).toBeGreaterThanOrEqual(0);
      expect(n).toBeLessThan(1);
    }
  });

  it("keeps int draws in range", () => {
    const rng = createRng(3);
    for (let i = 0; i < 200; i++) {
      const n = rng.int(4);
      expect(Number.isInteger(n)).toBe(true);
      expect(n).toBeGreaterThanOrEqual(0);
      expect(n).toBeLessThan(4);
    }
  });
});

describe("randomTileType", () => {
  it("never returns an excluded type", () => {
    const rng = createRng(5);
    const exclude = new Set([TileType.Red, TileType.Yellow, TileType.Green]);
    for (let i = 0; i < 20; i++) {
      expect(randomTileType(rng, COLORED_TILE_TYPES, exclude)).toBe(TileType.Blue);
    }
  });

  it("falls back to every color when all are excluded", () => {
    const rng = createRng(5);
    expect(randomTileType(rng, [TileType.Red], new Set([TileType.Red]))).toBe(TileType.Red);
  });

  it("pick returns an element of the list", () => {
    expect(["a", "b", "c"]).toContain(pick(createRng(9), ["a", "b", "c"]));
  });
});

describe("generateGrid", () => {
  it("produces a column-major layout of the requested size", () => {
    const layout = generateGrid(5, 4, COLORED_TILE_TYPES, createRng(11));
    expect(layout).toHaveLength(5);
    expect(layout.every((column) => column.length === 4)).toBe(true);
  });

  it("never starts with a match", () => {
    for (const seed of [1, 2, 3, 4, 5, 6, 7, 8]) {
      const grid = Grid.fromTypes(generateGrid(8, 8, COLORED_TILE_TYPES, createRng(seed)));
      expect(findAllMatches(grid)).toEqual([]);
    }
  });

  it("is deterministic for a seed", () => {
    const a = generateGrid(6, 6, COLORED_TILE_TYPES, createRng(99));
    const b = generateGrid(6, 6, COLORED_TILE_TYPES, createRng(99));
    expect(a).toEqual(b);
  });
});
