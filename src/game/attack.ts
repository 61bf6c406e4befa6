import type { Player } from "../types.ts";
import type { Coord } from "./coords.ts";
import type { GameState } from "./state.ts";
import { occupiedSquares } from "./board.ts";
import { sameCoord } from "./coords.ts";
import { generatePseudoLegalDestinations } from "./movegenPseudo.ts";

function kingSquare(state: GameState, player: Player): Coord | null {
  for (const sq of state.board) {
    if (sq.piece && sq.piece.kind === "K" && sq.piece.owner === player) return sq.coord;
  }
  return null;
}

export function hasKing(state: GameState, player: Player): boolean {
  return kingSquare(state, player) !== null;
}

export function findKing(state: GameState, player: Player): Coord {
  const king = kingSquare(state, player);
  if (king) return king;
  throw new Error(`findKing: no ${player === "W" ? "White" : "Black"} king on the board`);
}

/**
 * True when any enemy piece could move onto `player`'s king.
 * Recomputed from scratch: every enemy piece's pseudo-legal destinations are generated.
 */
export function isInCheck(state: GameState, player: Player): boolean {
  const king = findKing(state, player);
  for (const { coord, piece } of occupiedSquares(state.board)) {
    if (piece.owner === player) continue;
    if (generatePseudoLegalDestinations(state, coord).some((to) => sameCoord(to, king))) return true;
  }
  return false;
}
