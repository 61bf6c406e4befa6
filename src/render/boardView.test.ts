import { describe, it, expect } from "vitest";
import { createGameStateFromLayout, createInitialGameState } from "../game/state.ts";
import { describeBoard, renderBoardText } from "./boardView.ts";

describe("describeBoard", () => {
  it("lists 64 squares from a1 to h8", () => {
    const views = describeBoard(createInitialGameState());
    expect(views.length).toBe(64);
    expect(views[0].text).toBe("a1");
    expect(views[7].text).toBe("h1");
    expect(views[63].text).toBe("h8");
  });

  it("a1 is dark, h1 is light", () => {
    const views = describeBoard(createInitialGameState());
    expect(views[0].shade).toBe("dark");
    expect(views[7].shade).toBe("light");
  });

  it("carries piece, label and en passant flag", () => {
    const s = createGameStateFromLayout({ e1: "K", e8: "k", d5: "p" }, { enPassantable: ["d5"] });
    const d5 = describeBoard(s)[35];
    expect(d5).toEqual({
      coord: { file: 3, rank: 4 },
      text: "d5",
      piece: { kind: "P", owner: "B" },
      label: "Black Pawn",
      enPassantable: true,
      shade: "light",
      selected: false,
      target: false,
    });
    expect(describeBoard(s)[36].piece).toBeNull();
    expect(describeBoard(s)[36].label).toBeNull();
  });
});

describe("renderBoardText", () => {
  it("draws rank 8 at the top", () => {
    expect(renderBoardText(createInitialGameState()).split("\n")).toEqual([
      "rnbqkbnr",
      "pppppppp",
      "........",
      "........",
      "........",
      "........",
      "PPPPPPPP",
      "RNBQKBNR",
    ]);
  });
});
