import type { Piece, PieceKind, Player } from "../types.ts";

const KIND_LETTERS: readonly PieceKind[] = ["P", "R", "N", "B", "Q", "K"];

function isPieceKind(raw: string): raw is PieceKind {
  return KIND_LETTERS.some((k) => k === raw);
}

function ownerLabel(owner: Player): string {
  return owner === "W" ? "White" : "Black";
}

export function kindLabel(kind: PieceKind): string {
  switch (kind) {
    case "P": return "Pawn";
    case "N": return "Knight";
    case "B": return "Bishop";
    case "R": return "Rook";
    case "Q": return "Queen";
    case "K": return "King";
  }
}

export function pieceTooltip(p: Piece): string {
  return `${ownerLabel(p.owner)} ${kindLabel(p.kind)}`;
}

/** Upper case for White, lower case for Black. */
export function pieceLetter(p: Pick<Piece, "owner" | "kind">): string {
  return p.owner === "W" ? p.kind : p.kind.toLowerCase();
}

export function pieceFromLetter(letter: string): Piece | null {
  if (letter.length !== 1) return null;
  const kind = letter.toUpperCase();
  if (!isPieceKind(kind)) return null;
  const owner: Player = letter === kind ? "W" : "B";
  return { owner, kind, hasMoved: false, enPassantable: false };
}
