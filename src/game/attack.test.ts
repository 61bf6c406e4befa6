import { describe, it, expect } from "vitest";
import { findKing, hasKing, isInCheck } from "./attack.ts";
import { createGameStateFromLayout, createInitialGameState } from "./state.ts";

describe("findKing", () => {
  it("locates each king", () => {
    const s = createInitialGameState();
    expect(findKing(s, "W")).toEqual({ file: 4, rank: 0 });
    expect(findKing(s, "B")).toEqual({ file: 4, rank: 7 });
  });

  it("throws when a king is missing", () => {
    const s = createGameStateFromLayout({ e1: "K" });
    expect(() => findKing(s, "B")).toThrow("findKing: no Black king on the board");
    expect(hasKing(s, "W")).toBe(true);
    expect(hasKing(s, "B")).toBe(false);
  });
});

describe("isInCheck", () => {
  it("nobody is in check at the start", () => {
    const s = createInitialGameState();
    expect(isInCheck(s, "W")).toBe(false);
    expect(isInCheck(s, "B")).toBe(false);
  });

  it("sliding check along an open file, blocked by an interposed piece", () => {
    expect(isInCheck(createGameStateFromLayout({ e1: "K", e8: "r", a8: "k" }), "W")).toBe(true);
    expect(isInCheck(createGameStateFromLayout({ e1: "K", e4: "N", e8: "r", a8: "k" }), "W")).toBe(false);
  });

  it("knight and pawn checks", () => {
    expect(isInCheck(createGameStateFromLayout({ e1: "K", f3: "n", h8: "k" }), "W")).toBe(true);
    expect(isInCheck(createGameStateFromLayout({ e1: "K", d2: "p", h8: "k" }), "W")).toBe(true);
    // A pawn straight ahead does not give check.
    expect(isInCheck(createGameStateFromLayout({ e1: "K", e2: "p", h8: "k" }), "W")).toBe(false);
  });

  it("own pieces never give check", () => {
    expect(isInCheck(createGameStateFromLayout({ e1: "K", e8: "R", a8: "k" }), "W")).toBe(false);
    expect(isInCheck(createGameStateFromLayout({ e1: "K", e8: "R", a8: "k" }), "B")).toBe(true);
  });
});
