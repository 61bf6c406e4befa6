import type { Piece } from "../types.ts";
import type { Board } from "./board.ts";
import type { Coord } from "./coords.ts";
import type { GameState } from "./state.ts";
import { pieceAt } from "./board.ts";
import { coordToText } from "./coordFormat.ts";
import { offsetCoord } from "./coords.ts";
import { isSlidingKind, pawnDirection, slidingOffsets, steppingOffsets } from "./pieceTables.ts";

function isEnemy(board: Board, c: Coord, mover: Piece): boolean {
  const p = pieceAt(board, c);
  return p !== null && p.owner !== mover.owner;
}

function slidingDestinations(board: Board, from: Coord, piece: Piece & { kind: "R" | "B" | "Q" }): Coord[] {
  const out: Coord[] = [];
  for (const [df, dr] of slidingOffsets(piece.kind)) {
    let next = offsetCoord(from, df, dr);
    while (next) {
      const hit = pieceAt(board, next);
      if (hit) {
        if (hit.owner !== piece.owner) out.push(next);
        break;
      }
      out.push(next);
      next = offsetCoord(next, df, dr);
    }
  }
  return out;
}

function steppingDestinations(board: Board, from: Coord, piece: Piece & { kind: "N" | "K" }): Coord[] {
  const out: Coord[] = [];
  for (const [df, dr] of steppingOffsets(piece.kind)) {
    const to = offsetCoord(from, df, dr);
    if (!to) continue;
    const hit = pieceAt(board, to);
    if (!hit || hit.owner !== piece.owner) out.push(to);
  }
  return out;
}

function pawnDestinations(board: Board, from: Coord, piece: Piece): Coord[] {
  const out: Coord[] = [];
  const dir = pawnDirection(piece.owner);

  const one = offsetCoord(from, 0, dir);
  if (one && !pieceAt(board, one)) {
    out.push(one);
    const two = piece.hasMoved ? null : offsetCoord(from, 0, 2 * dir);
    if (two && !pieceAt(board, two)) out.push(two);
  }

  for (const df of [-1, 1]) {
    const diag = offsetCoord(from, df, dir);
    if (!diag) continue;
    if (isEnemy(board, diag, piece)) {
      out.push(diag);
      continue;
    }
    // En passant: the pawn beside us just double-pushed past this square.
    const beside = offsetCoord(from, df, 0);
    const passed = beside ? pieceAt(board, beside) : null;
    if (!pieceAt(board, diag) && passed && passed.kind === "P" && passed.owner !== piece.owner && passed.enPassantable) {
      out.push(diag);
    }
  }

  return out;
}

/**
 * Candidate destinations for the piece at `from`, ignoring king safety.
 * Castling is not included; see `getMoves`.
 */
export function generatePseudoLegalDestinations(state: GameState, from: Coord): Coord[] {
  const piece = pieceAt(state.board, from);
  if (!piece) throw new Error(`generatePseudoLegalDestinations: no piece at ${coordToText(from)}`);

  if (piece.kind === "P") return pawnDestinations(state.board, from, piece);
  if (isSlidingKind(piece.kind)) return slidingDestinations(state.board, from, { ...piece, kind: piece.kind });
  return steppingDestinations(state.board, from, { ...piece, kind: piece.kind });
}
