import type { Piece, Player, PromotionKind } from "../types.ts";
import type { Board } from "./board.ts";
import type { PerformedMove } from "./moveTypes.ts";
import { cloneBoard, createEmptyBoard, setPiece } from "./board.ts";
import { parseCoordText } from "./coordFormat.ts";
import { standardLayout } from "./initialPosition.ts";
import { pieceFromLetter } from "../pieces/pieceLabel.ts";

export interface GameState {
  board: Board;
  toMove: Player;
  /** Append-only log of performed relocations. */
  history: PerformedMove[];
  /** Kind a promoting pawn becomes when a move is built without an explicit choice. */
  promotionChoice: PromotionKind;
}

export interface LayoutOptions {
  toMove?: Player;
  promotionChoice?: PromotionKind;
  /** Squares whose piece is marked as already moved. */
  moved?: readonly string[];
  /** Squares whose piece is flagged en-passant eligible (also marks it moved). */
  enPassantable?: readonly string[];
}

function pawnStartRank(owner: Player): number {
  return owner === "W" ? 1 : 6;
}

/**
 * Build a position from a placement map such as `{ e1: "K", e8: "k" }`.
 * Pawns standing off their starting rank count as moved.
 */
export function createGameStateFromLayout(layout: Record<string, string>, opts: LayoutOptions = {}): GameState {
  const board = createEmptyBoard();
  const moved = new Set(opts.moved ?? []);
  const flagged = new Set(opts.enPassantable ?? []);

  for (const [text, letter] of Object.entries(layout)) {
    const coord = parseCoordText(text);
    if (!coord) throw new Error(`createGameStateFromLayout: invalid square '${text}'`);
    const base = pieceFromLetter(letter);
    if (!base) throw new Error(`createGameStateFromLayout: invalid piece '${letter}' on ${text}`);

    const offStart = base.kind === "P" && coord.rank !== pawnStartRank(base.owner);
    const piece: Piece = {
      ...base,
      hasMoved: moved.has(text) || flagged.has(text) || offStart,
      enPassantable: flagged.has(text),
    };
    setPiece(board, coord, piece);
  }

  return {
    board,
    toMove: opts.toMove ?? "W",
    history: [],
    promotionChoice: opts.promotionChoice ?? "Q",
  };
}

export function createInitialGameState(): GameState {
  return createGameStateFromLayout(standardLayout());
}

/** Deep copy; the clone shares nothing mutable with the source. */
export function cloneGameState(state: GameState): GameState {
  return {
    board: cloneBoard(state.board),
    toMove: state.toMove,
    history: state.history.map((m) => ({ from: m.from, to: m.to })),
    promotionChoice: state.promotionChoice,
  };
}
