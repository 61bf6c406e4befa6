import type { Coord } from "./coords.ts";
import type { CastleMove, Move } from "./moveTypes.ts";
import type { GameState } from "./state.ts";
import { pieceAt, setPiece } from "./board.ts";
import { coordToText } from "./coordFormat.ts";

function record(state: GameState, from: Coord, to: Coord): void {
  state.history.push({ from, to });
}

function relocate(state: GameState, from: Coord, to: Coord): void {
  const piece = pieceAt(state.board, from);
  if (!piece) throw new Error(`applyMove: no piece at ${coordToText(from)}`);
  setPiece(state.board, to, { ...piece, hasMoved: true });
  setPiece(state.board, from, null);
}

function performCastle(state: GameState, move: CastleMove): void {
  const rank = move.from.rank;
  const rookFrom = { file: move.long ? 0 : 7, rank };
  const rookTo = { file: move.long ? 3 : 5, rank };

  const rook = pieceAt(state.board, rookFrom);
  if (!rook || rook.kind !== "R" || rook.owner !== move.player) {
    throw new Error(`applyMove: no rook to castle with at ${coordToText(rookFrom)}`);
  }

  record(state, rookFrom, rookTo);
  relocate(state, rookFrom, rookTo);
  record(state, move.from, move.to);
  relocate(state, move.from, move.to);
}

/**
 * Run the move's own effect. Returns true when it already relocated the pieces,
 * false when the generic relocation still has to happen.
 */
function runEffect(state: GameState, move: Move): boolean {
  switch (move.kind) {
    case "normal":
      record(state, move.from, move.to);
      return false;

    case "doublePush": {
      record(state, move.from, move.to);
      const pawn = pieceAt(state.board, move.from);
      if (pawn) setPiece(state.board, move.from, { ...pawn, hasMoved: true, enPassantable: true });
      return false;
    }

    case "enPassant":
      record(state, move.from, move.to);
      relocate(state, move.from, move.to);
      setPiece(state.board, move.captured, null);
      return true;

    case "promotion": {
      record(state, move.from, move.to);
      const pawn = pieceAt(state.board, move.from);
      if (!pawn) throw new Error(`applyMove: no piece at ${coordToText(move.from)}`);
      setPiece(state.board, move.to, { owner: pawn.owner, kind: move.promoteTo, hasMoved: true, enPassantable: false });
      setPiece(state.board, move.from, null);
      return true;
    }

    case "castle":
      performCastle(state, move);
      return true;
  }
}

/**
 * Apply `move` to `state` in place. Turn flipping is left to `endTurn`.
 */
export function applyMove(state: GameState, move: Move): void {
  if (!pieceAt(state.board, move.from)) throw new Error(`applyMove: no piece at ${coordToText(move.from)}`);

  if (!runEffect(state, move)) relocate(state, move.from, move.to);
}
