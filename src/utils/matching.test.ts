import { describe, expect, it } from "vitest";
import { Grid } from "../game/Grid";
import { COLORED_TILE_TYPES, MatchOrientation } from "../types";
import { findAllMatches, findMatchesAt, findValidMove, hasValidMoves } from "./matching";
import { createRng, randomTileType } from "./random";

const cells = (tiles: readonly { x: number; y: number }[]): string[] => tiles.map((t) => `${t.x},${t.y}`);

describe("findAllMatches", () => {
  it("finds nothing on a board without runs", () => {
    expect(findAllMatches(Grid.fromLayout(["RGB", "GBR", "BRG"]))).toEqual([]);
  });

  it("ignores runs of two and runs of power-ups", () => {
    expect(findAllMatches(Grid.fromLayout(["RRG", "HHH"]))).toEqual([]);
  });

  it("pivots a full-scan run on its middle tile", () => {
    const [match, ...rest] = findAllMatches(Grid.fromLayout(["RRRRR"]));
    expect(rest).toEqual([]);
    expect(match.orientation).toBe(MatchOrientation.Horizontal);
    expect(match.count).toBe(5);
    expect(match.pivot).toEqual({ x: 2, y: 0 });
    expect(match.isPowerUpMatch).toBe(true);
  });

  it("reports a run of three that cannot spawn anything", () => {
    const [match] = findAllMatches(Grid.fromLayout(["G", "G", "G", "B"]));
    expect(match.orientation).toBe(MatchOrientation.Vertical);
    expect(cells(match.tiles)).toEqual(["0,1", "0,2", "0,3"]);
    expect(match.pivot).toEqual({ x: 0, y: 2 });
    expect(match.isPowerUpMatch).toBe(false);
  });

  it("reports a long run once", () => {
    expect(findAllMatches(Grid.fromLayout(["RRRR"]))).toHaveLength(1);
  });

  it("gives squares precedence and stops runs at claimed cells", () => {
    const matches = findAllMatches(Grid.fromLayout(["RRB", "RRR"]));
    expect(matches).toHaveLength(1);
    expect(matches[0].orientation).toBe(MatchOrientation.Square);
    expect(matches[0].isSnitchMatch).toBe(true);
    expect(cells(matches[0].tiles)).toEqual(["0,0", "1,0", "0,1", "1,1"]);
    expect(matches[0].pivot).toEqual({ x: 0, y: 0 });
  });

  it("does not let two squares share a tile", () => {
    const matches = findAllMatches(Grid.fromLayout(["RRR", "RRR"]));
    expect(matches.map((m) => m.orientation)).toEqual([MatchOrientation.Square]);
  });

  it("reports both runs of a cross shape", () => {
    const matches = findAllMatches(Grid.fromLayout([".R.", ".R.", "RRR"]));
    expect(matches.map((m) => m.orientation)).toEqual([MatchOrientation.Horizontal, MatchOrientation.Vertical]);
    expect(matches[0].pivot).toEqual({ x: 1, y: 0 });
    expect(matches[1].pivot).toEqual({ x: 1, y: 1 });
  });
});

describe("findAllMatches on random boards", () => {
  it("never shares a tile between squares or between runs of one orientation", () => {
    for (let seed = 1; seed <= 25; seed++) {
      const rng = createRng(seed);
      const grid = Grid.fromTypes(
        Array.from({ length: 8 }, () => Array.from({ length: 8 }, () => randomTileType(rng, COLORED_TILE_TYPES))),
      );
      const matches = findAllMatches(grid);

      for (const orientation of [MatchOrientation.Square, MatchOrientation.Horizontal, MatchOrientation.Vertical]) {
        const tiles = matches.filter((m) => m.orientation === orientation).flatMap((m) => cells(m.tiles));
        expect(new Set(tiles).size).toBe(tiles.length);
      }
      const squareTiles = new Set(matches.filter((m) => m.isSnitchMatch).flatMap((m) => cells(m.tiles)));
      const linearTiles = matches.filter((m) => !m.isSnitchMatch).flatMap((m) => cells(m.tiles));
      expect(linearTiles.filter((c) => squareTiles.has(c))).toEqual([]);
      expect(matches.every((m) => m.tiles.every((t) => t.isColored))).toBe(true);
    }
  });
});

describe("findMatchesAt", () => {
  it("pivots on the seed", () => {
    const [match] = findMatchesAt(Grid.fromLayout(["RRRRR"]), { x: 4, y: 0 });
    expect(match.pivot).toEqual({ x: 4, y: 0 });
    expect(match.count).toBe(5);
  });

  it("finds a square from any of its corners", () => {
    const grid = Grid.fromLayout(["GRR", "BRR"]);
    const [square] = findMatchesAt(grid, { x: 2, y: 1 });
    expect(square.orientation).toBe(MatchOrientation.Square);
    expect(square.pivot).toEqual({ x: 2, y: 1 });
    expect(cells(square.tiles)).toEqual(["1,0", "2,0", "1,1", "2,1"]);
  });

  it("skips runs that do not pass through a seed", () => {
    const grid = Grid.fromLayout(["RRR", "GBG"]);
    expect(findMatchesAt(grid, { x: 0, y: 0 })).toEqual([]);
  });
});

describe("findValidMove", () => {
  it("returns the swap that completes a run and restores the board", () => {
    const rows = ["GYBG", "RRBR"];
    const grid = Grid.fromLayout(rows);
    expect(findValidMove(grid)).toEqual({ a: { x: 2, y: 0 }, b: { x: 3, y: 0 } });
    expect(grid.toLayout()).toEqual(rows);
  });

  it("returns null when no swap matches", () => {
    expect(findValidMove(Grid.fromLayout(["RR", "GB", "BG"]))).toBeNull();
  });
});

describe("hasValidMoves", () => {
  it("is false on a stuck board", () => {
    expect(hasValidMoves(Grid.fromLayout(["RR", "GB", "BG"]))).toBe(false);
  });

  it("counts a power-up as a move", () => {
    expect(hasValidMoves(Grid.fromLayout(["RH", "GB", "BG"]))).toBe(true);
  });
});
