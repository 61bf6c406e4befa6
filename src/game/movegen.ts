import type { Piece, Player, PromotionKind } from "../types.ts";
import type { Coord } from "./coords.ts";
import type { CastleMove, Move } from "./moveTypes.ts";
import type { GameState } from "./state.ts";
import { occupiedSquares, pieceAt } from "./board.ts";
import { coordToText } from "./coordFormat.ts";
import { filterLegalDestinations } from "./legality.ts";
import { generatePseudoLegalDestinations } from "./movegenPseudo.ts";
import { promotionRank } from "./pieceTables.ts";

function classifyDestination(state: GameState, from: Coord, to: Coord, piece: Piece, promoteTo: PromotionKind): Move {
  if (piece.kind !== "P") return { kind: "normal", from, to };

  if (to.rank === promotionRank(piece.owner)) {
    return { kind: "promotion", from, to, promoteTo };
  }
  if (!piece.hasMoved && Math.abs(to.rank - from.rank) === 2) {
    return { kind: "doublePush", from, to };
  }
  if (to.file !== from.file && !pieceAt(state.board, to)) {
    return { kind: "enPassant", from, to, captured: { file: to.file, rank: from.rank } };
  }
  return { kind: "normal", from, to };
}

function rangeIsEmpty(state: GameState, rank: number, fromFile: number, toFile: number): boolean {
  for (let file = fromFile; file <= toFile; file++) {
    if (pieceAt(state.board, { file, rank })) return false;
  }
  return true;
}

/**
 * Castling for an unmoved king: the corner rook on its rank must be an unmoved
 * rook of the same colour with every square between them empty.
 * Attacked squares are deliberately not consulted.
 */
export function generateCastlingMoves(state: GameState, from: Coord): CastleMove[] {
  const king = pieceAt(state.board, from);
  if (!king || king.kind !== "K" || king.hasMoved) return [];

  const out: CastleMove[] = [];
  const rank = from.rank;

  for (const long of [true, false]) {
    const rookFile = long ? 0 : 7;
    const rook = pieceAt(state.board, { file: rookFile, rank });
    if (!rook || rook.kind !== "R" || rook.owner !== king.owner || rook.hasMoved) continue;

    const clear = long
      ? rangeIsEmpty(state, rank, 1, from.file - 1)
      : rangeIsEmpty(state, rank, from.file + 1, 6);
    if (!clear) continue;

    out.push({ kind: "castle", long, player: king.owner, from, to: { file: long ? 2 : 6, rank } });
  }

  return out;
}

/**
 * Moves for the piece at `from`, each tagged with the effect it has when applied.
 * With `filterForChecks`, destinations leaving the mover's king attacked are dropped.
 * `promoteTo` defaults to the state's current promotion choice.
 */
export function getMoves(
  state: GameState,
  from: Coord,
  filterForChecks: boolean = true,
  promoteTo: PromotionKind = state.promotionChoice
): Move[] {
  const piece = pieceAt(state.board, from);
  if (!piece) throw new Error(`getMoves: no piece at ${coordToText(from)}`);

  const candidates = generatePseudoLegalDestinations(state, from);
  const destinations = filterForChecks ? filterLegalDestinations(state, from, candidates) : candidates;

  const moves = destinations.map((to) => classifyDestination(state, from, to, piece, promoteTo));
  moves.push(...generateCastlingMoves(state, from));
  return moves;
}

/** Every legal move for `player`, castling included. */
export function generateLegalMovesForPlayer(state: GameState, player: Player = state.toMove): Move[] {
  const moves: Move[] = [];
  for (const { coord, piece } of occupiedSquares(state.board)) {
    if (piece.owner !== player) continue;
    moves.push(...getMoves(state, coord, true));
  }
  return moves;
}

/** Whether any piece of `player` has a check-safe destination (castling not counted). */
export function hasAnyLegalMove(state: GameState, player: Player): boolean {
  for (const { coord, piece } of occupiedSquares(state.board)) {
    if (piece.owner !== player) continue;
    const candidates = generatePseudoLegalDestinations(state, coord);
    if (filterLegalDestinations(state, coord, candidates).length > 0) return true;
  }
  return false;
}
