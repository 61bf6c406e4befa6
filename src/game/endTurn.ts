import type { GameState } from "./state.ts";
import { opponentOf } from "../types.ts";

/**
 * End a turn: flip `toMove`, then clear en-passant eligibility on every piece
 * of the side that now has the move, so a double push survives one reply only.
 */
export function endTurn(state: GameState): void {
  state.toMove = opponentOf(state.toMove);

  for (const sq of state.board) {
    if (sq.piece && sq.piece.owner === state.toMove && sq.piece.enPassantable) {
      sq.piece = { ...sq.piece, enPassantable: false };
    }
  }
}
