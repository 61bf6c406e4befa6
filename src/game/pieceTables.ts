import type { PieceKind, Player } from "../types.ts";

export type Offset = readonly [df: number, dr: number];
export type SlidingKind = "R" | "B" | "Q";

export const ROOK_OFFSETS: readonly Offset[] = [
  [-1, 0],
  [1, 0],
  [0, -1],
  [0, 1],
];

export const BISHOP_OFFSETS: readonly Offset[] = [
  [-1, -1],
  [1, -1],
  [-1, 1],
  [1, 1],
];

export const QUEEN_OFFSETS: readonly Offset[] = [...BISHOP_OFFSETS, ...ROOK_OFFSETS];

export const KNIGHT_OFFSETS: readonly Offset[] = [
  [1, 2],
  [-1, 2],
  [2, 1],
  [-2, 1],
  [2, -1],
  [-2, -1],
  [1, -2],
  [-1, -2],
];

export const KING_OFFSETS: readonly Offset[] = [
  [-1, -1],
  [-1, 0],
  [-1, 1],
  [0, 1],
  [0, -1],
  [1, -1],
  [1, 0],
  [1, 1],
];

export function isSlidingKind(kind: PieceKind): kind is SlidingKind {
  return kind === "R" || kind === "B" || kind === "Q";
}

export function slidingOffsets(kind: SlidingKind): readonly Offset[] {
  switch (kind) {
    case "R":
      return ROOK_OFFSETS;
    case "B":
      return BISHOP_OFFSETS;
    case "Q":
      return QUEEN_OFFSETS;
  }
}

export function steppingOffsets(kind: "N" | "K"): readonly Offset[] {
  return kind === "N" ? KNIGHT_OFFSETS : KING_OFFSETS;
}

export function pawnDirection(owner: Player): 1 | -1 {
  return owner === "W" ? 1 : -1;
}

export function promotionRank(owner: Player): 0 | 7 {
  return owner === "W" ? 7 : 0;
}
