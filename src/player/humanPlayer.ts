import type { Coord } from "../game/coords.ts";
import type { Move } from "../game/moveTypes.ts";
import type { GameState } from "../game/state.ts";
import { pieceAt } from "../game/board.ts";
import { findMoveTo } from "../game/moveTypes.ts";
import { getMoves } from "../game/movegen.ts";
import { MirrorPlayer } from "./mirrorPlayer.ts";

/** Sends whatever move the input layer queued, on the next tick that is its turn. */
export class HumanPlayer extends MirrorPlayer {
  private queued: Move | null = null;

  /** Returns false when `from -> to` is not a legal move of this side in the mirror. */
  queueMove(from: Coord, to: Coord): boolean {
    const piece = pieceAt(this.mirror.board, from);
    if (!piece || piece.owner !== this.side) return false;

    const move = findMoveTo(getMoves(this.mirror, from, true), to);
    if (!move) return false;

    this.queued = move;
    return true;
  }

  hasQueuedMove(): boolean {
    return this.queued !== null;
  }

  protected chooseMove(_view: GameState): Move | null {
    const move = this.queued;
    this.queued = null;
    return move;
  }
}
