import type { Coord } from "./coords.ts";
import type { GameState } from "./state.ts";
import { pieceAt, setPiece } from "./board.ts";
import { coordToText } from "./coordFormat.ts";
import { isInCheck } from "./attack.ts";
import { cloneGameState } from "./state.ts";

function relocateForCheckTest(scratch: GameState, from: Coord, to: Coord): void {
  const piece = pieceAt(scratch.board, from);
  if (!piece) return;

  // A pawn changing file onto an empty square is an en passant capture.
  if (piece.kind === "P" && from.file !== to.file && !pieceAt(scratch.board, to)) {
    setPiece(scratch.board, { file: to.file, rank: from.rank }, null);
  }

  setPiece(scratch.board, to, { ...piece, hasMoved: true });
  setPiece(scratch.board, from, null);
}

/**
 * Keep the destinations after which the mover's own king is not attacked.
 * Each candidate is tried on a full clone of the state.
 */
export function filterLegalDestinations(state: GameState, from: Coord, destinations: readonly Coord[]): Coord[] {
  const mover = pieceAt(state.board, from);
  if (!mover) throw new Error(`filterLegalDestinations: no piece at ${coordToText(from)}`);

  return destinations.filter((to) => {
    const scratch = cloneGameState(state);
    relocateForCheckTest(scratch, from, to);
    return !isInCheck(scratch, mover.owner);
  });
}
