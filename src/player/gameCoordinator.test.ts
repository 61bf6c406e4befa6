import { afterEach, describe, it, expect, vi } from "vitest";
import type { Player } from "../types.ts";
import type { Coord } from "../game/coords.ts";
import type { Move } from "../game/moveTypes.ts";
import type { GameState } from "../game/state.ts";
import { parseCoordText, performedMoveToText } from "../game/coordFormat.ts";
import { hashGameState } from "../game/hashState.ts";
import { findMoveTo } from "../game/moveTypes.ts";
import { getMoves } from "../game/movegen.ts";
import { GameCoordinator } from "./gameCoordinator.ts";
import { HumanPlayer } from "./humanPlayer.ts";
import { MirrorPlayer } from "./mirrorPlayer.ts";
import { RandomPlayer } from "./randomPlayer.ts";

function at(text: string): Coord {
  const c = parseCoordText(text);
  if (!c) throw new Error(`bad square ${text}`);
  return c;
}

/** Plays a fixed list of moves; a pair that is not legal in its mirror is sent as a plain normal move. */
class ScriptedPlayer extends MirrorPlayer {
  private script: Array<[string, string]>;

  constructor(side: Player, script: Array<[string, string]>) {
    super(side);
    this.script = [...script];
  }

  protected chooseMove(view: GameState): Move | null {
    const next = this.script.shift();
    if (!next) return null;
    const from = at(next[0]);
    const to = at(next[1]);
    return findMoveTo(getMoves(view, from), to) ?? { kind: "normal", from, to };
  }
}

const open: GameCoordinator[] = [];

function seat(white: MirrorPlayer, black: MirrorPlayer): GameCoordinator {
  const coord = new GameCoordinator(white, black);
  open.push(coord);
  return coord;
}

afterEach(() => {
  for (const coord of open.splice(0)) coord.close();
  vi.restoreAllMocks();
});

describe("GameCoordinator", () => {
  it("wants White in the first seat", () => {
    expect(() => new GameCoordinator(new HumanPlayer("B"), new HumanPlayer("W"))).toThrow(
      "GameCoordinator: players must sit as White then Black"
    );
  });

  it("relays queued human moves and keeps both mirrors in step", () => {
    const white = new HumanPlayer("W");
    const black = new HumanPlayer("B");
    const coord = seat(white, black);

    expect(white.queueMove(at("e7"), at("e5"))).toBe(false);
    expect(white.queueMove(at("e2"), at("e5"))).toBe(false);
    expect(white.queueMove(at("e2"), at("e4"))).toBe(true);
    expect(coord.tick()).toBe(true);
    expect(white.hasQueuedMove()).toBe(false);

    expect(black.queueMove(at("e7"), at("e5"))).toBe(true);
    expect(coord.tick()).toBe(true);
    // White picks up Black's reply on this tick.
    expect(coord.tick()).toBe(false);

    expect(coord.getState().history.map(performedMoveToText)).toEqual(["e2e4", "e7e5"]);
    expect(hashGameState(white.getMirror())).toBe(hashGameState(coord.getState()));
    expect(hashGameState(black.getMirror())).toBe(hashGameState(coord.getState()));

    // Nothing queued: two idle ticks end play().
    expect(coord.play(10)).toBe(0);
  });

  it("plays out a scripted checkmate", () => {
    const white = new ScriptedPlayer("W", [["f2", "f3"], ["g2", "g4"]]);
    const black = new ScriptedPlayer("B", [["e7", "e5"], ["d8", "h4"]]);
    const coord = seat(white, black);

    expect(coord.play(20)).toBe(4);
    expect(coord.isOver()).toBe(true);
    expect(coord.getResult()).toEqual({ winner: "B", reason: "Black wins — White is checkmated" });
  });

  it("rejects an illegal move, logs it and resyncs the sender", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const white = new ScriptedPlayer("W", [["e2", "e5"], ["e2", "e4"]]);
    const black = new RandomPlayer("B", "resync");
    const coord = seat(white, black);

    expect(coord.tick()).toBe(false);
    expect(coord.getState().history).toEqual([]);
    expect(coord.getState().toMove).toBe("W");
    expect(warn).toHaveBeenCalledWith("[chess-engine] [coordinator] rejected move from W", {
      kind: "normal",
      from: at("e2"),
      to: at("e5"),
    });
    // The sender moved its mirror ahead before the rejection.
    expect(white.getMirror().toMove).toBe("B");

    // White reads the resync on this tick.
    expect(coord.tick()).toBe(false);
    expect(hashGameState(white.getMirror())).toBe(hashGameState(coord.getState()));

    expect(coord.tick()).toBe(true);
    expect(coord.getState().history.map(performedMoveToText)).toEqual(["e2e4"]);
    expect(hashGameState(white.getMirror())).toBe(hashGameState(coord.getState()));
    expect(hashGameState(black.getMirror())).toBe(hashGameState(coord.getState()));
  });

  it("seeded random players play the same game twice", () => {
    const first = seat(new RandomPlayer("W", "game-1"), new RandomPlayer("B", "game-1-b"));
    const second = seat(new RandomPlayer("W", "game-1"), new RandomPlayer("B", "game-1-b"));

    const pliesA = first.play(40);
    const pliesB = second.play(40);

    expect(pliesB).toBe(pliesA);
    expect(first.isOver() || pliesA === 40).toBe(true);
    expect(hashGameState(second.getState())).toBe(hashGameState(first.getState()));
  });

  it("random players' mirrors agree with the authoritative game", () => {
    const white = new RandomPlayer("W", 7);
    const black = new RandomPlayer("B", 8);
    const coord = seat(white, black);

    coord.play(30);
    // Lets a seat that has not read the last forwarded move catch up.
    coord.tick();

    expect(hashGameState(white.getMirror())).toBe(hashGameState(coord.getState()));
    expect(hashGameState(black.getMirror())).toBe(hashGameState(coord.getState()));
  });
});
