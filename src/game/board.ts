import type { Piece } from "../types.ts";
import type { Coord } from "./coords.ts";
import { BOARD_SIZE, coordFromIndex, coordIndex } from "./coords.ts";

export interface Square {
  readonly coord: Coord;
  piece: Piece | null;
}

/** Exactly 64 squares, indexed `file + 8 * rank`. */
export type Board = Square[];

export const SQUARE_COUNT = BOARD_SIZE * BOARD_SIZE;

export const ALL_COORDS: readonly Coord[] = Array.from({ length: SQUARE_COUNT }, (_, i) => coordFromIndex(i));

export function createEmptyBoard(): Board {
  return ALL_COORDS.map((coord) => ({ coord, piece: null }));
}

export function getSquare(board: Board, c: Coord): Square {
  const sq = board[coordIndex(c)];
  if (!sq) throw new Error(`getSquare: no square at (${c.file}, ${c.rank})`);
  return sq;
}

export function pieceAt(board: Board, c: Coord): Piece | null {
  return getSquare(board, c).piece;
}

export function setPiece(board: Board, c: Coord, piece: Piece | null): void {
  getSquare(board, c).piece = piece;
}

export function cloneBoard(board: Board): Board {
  return board.map((sq) => ({ coord: sq.coord, piece: sq.piece ? { ...sq.piece } : null }));
}

export function occupiedSquares(board: Board): Array<Square & { piece: Piece }> {
  const out: Array<Square & { piece: Piece }> = [];
  for (const sq of board) {
    const piece = sq.piece;
    if (piece) out.push({ coord: sq.coord, piece });
  }
  return out;
}
