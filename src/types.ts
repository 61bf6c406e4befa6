export type Player = "W" | "B";
export type PieceKind = "P" | "R" | "N" | "B" | "Q" | "K";
export type PromotionKind = "Q" | "R" | "B" | "N";

export interface Piece {
  owner: Player;
  kind: PieceKind;
  hasMoved: boolean;
  /** Set by a double pawn push; survives exactly one opposing reply. */
  enPassantable: boolean;
}

export function opponentOf(p: Player): Player {
  return p === "W" ? "B" : "W";
}
