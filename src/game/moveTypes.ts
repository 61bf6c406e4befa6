import type { Player, PromotionKind } from "../types.ts";
import type { Coord } from "./coords.ts";
import { sameCoord } from "./coords.ts";

export interface NormalMove {
  kind: "normal";
  from: Coord;
  to: Coord;
}

export interface DoublePushMove {
  kind: "doublePush";
  from: Coord;
  to: Coord;
}

export interface EnPassantMove {
  kind: "enPassant";
  from: Coord;
  to: Coord;
  /** Square of the pawn taken: destination file, source rank. */
  captured: Coord;
}

export interface CastleMove {
  kind: "castle";
  long: boolean;
  player: Player;
  /** King squares; the rook's relocation is implied by `long`. */
  from: Coord;
  to: Coord;
}

export interface PromotionMove {
  kind: "promotion";
  from: Coord;
  to: Coord;
  promoteTo: PromotionKind;
}

export type Move = NormalMove | DoublePushMove | EnPassantMove | CastleMove | PromotionMove;

export interface PerformedMove {
  readonly from: Coord;
  readonly to: Coord;
}

/** Moves compare by destination when testing membership against a target square. */
export function isMoveTo(move: Move, target: Coord): boolean {
  return sameCoord(move.to, target);
}

export function findMoveTo(moves: readonly Move[], target: Coord): Move | null {
  return moves.find((m) => isMoveTo(m, target)) ?? null;
}
