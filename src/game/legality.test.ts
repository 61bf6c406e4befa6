import { describe, it, expect } from "vitest";
import type { Coord } from "./coords.ts";
import type { LayoutOptions } from "./state.ts";
import { coordToText, parseCoordText } from "./coordFormat.ts";
import { filterLegalDestinations } from "./legality.ts";
import { generatePseudoLegalDestinations } from "./movegenPseudo.ts";
import { createGameStateFromLayout } from "./state.ts";

function at(text: string): Coord {
  const c = parseCoordText(text);
  if (!c) throw new Error(`bad square ${text}`);
  return c;
}

function legal(layout: Record<string, string>, from: string, opts: LayoutOptions = {}): string[] {
  const s = createGameStateFromLayout(layout, opts);
  const candidates = generatePseudoLegalDestinations(s, at(from));
  return filterLegalDestinations(s, at(from), candidates).map(coordToText).sort();
}

describe("filterLegalDestinations", () => {
  it("a knight pinned to its king has no moves", () => {
    const layout = { e1: "K", e2: "N", e8: "r", a8: "k" };
    const s = createGameStateFromLayout(layout);
    expect(generatePseudoLegalDestinations(s, at("e2")).length).toBe(6);
    expect(legal(layout, "e2")).toEqual([]);
  });

  it("a pinned bishop may only move along the pin", () => {
    expect(legal({ e1: "K", d2: "B", b4: "b", h8: "k" }, "d2")).toEqual(["b4", "c3"]);
  });

  it("the king may not step onto attacked squares", () => {
    expect(legal({ e1: "K", a2: "r", h8: "k" }, "e1")).toEqual(["d1", "f1"]);
  });

  it("pieces must answer a check", () => {
    // Only blocking on e2..e7 or taking the rook helps; the rook on a4 can block on e4.
    expect(legal({ e1: "K", a4: "R", e8: "r", a8: "k" }, "a4")).toEqual(["e4"]);
  });

  it("an en passant capture that opens the rank to the king is dropped", () => {
    expect(legal({ a5: "K", b5: "P", c5: "p", h5: "r", h8: "k" }, "b5", { enPassantable: ["c5"] })).toEqual(["b6"]);
  });

  it("an en passant capture that removes the checking pawn is kept", () => {
    // e5-e6 would leave the d5 pawn giving check.
    expect(legal({ e4: "K", e5: "P", d5: "p", a8: "k" }, "e5", { enPassantable: ["d5"] })).toEqual(["d6"]);
  });

  it("does not touch the source state", () => {
    const s = createGameStateFromLayout({ e1: "K", e2: "N", e8: "r", a8: "k" });
    filterLegalDestinations(s, at("e2"), generatePseudoLegalDestinations(s, at("e2")));
    expect(s.board[at("e2").file + 8 * at("e2").rank].piece?.kind).toBe("N");
    expect(s.history).toEqual([]);
  });
});
