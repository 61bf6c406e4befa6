import type { PieceKind, Player } from "../types.ts";
import type { Coord } from "../game/coords.ts";
import type { GameState } from "../game/state.ts";
import { BOARD_SIZE, sameCoord } from "../game/coords.ts";
import { coordToText } from "../game/coordFormat.ts";
import { pieceAt } from "../game/board.ts";
import { pieceLetter, pieceTooltip } from "../pieces/pieceLabel.ts";

export interface SquareView {
  coord: Coord;
  text: string;
  piece: { kind: PieceKind; owner: Player } | null;
  /** Hover text such as "White Knight". */
  label: string | null;
  enPassantable: boolean;
  shade: "light" | "dark";
  selected: boolean;
  target: boolean;
}

export type BoardViewOptions = {
  selected?: Coord | null;
  targets?: readonly Coord[];
};

/**
 * Everything a renderer needs per square: sprite choice, shade and highlight state.
 * Squares are listed a1..h1, a2..h2, ... h8.
 */
export function describeBoard(state: GameState, opts: BoardViewOptions = {}): SquareView[] {
  const selected = opts.selected ?? null;
  const targets = opts.targets ?? [];

  return state.board.map((sq): SquareView => ({
    coord: sq.coord,
    text: coordToText(sq.coord),
    piece: sq.piece ? { kind: sq.piece.kind, owner: sq.piece.owner } : null,
    label: sq.piece ? pieceTooltip(sq.piece) : null,
    enPassantable: sq.piece?.enPassantable ?? false,
    shade: (sq.coord.file + sq.coord.rank) % 2 === 1 ? "light" : "dark",
    selected: selected !== null && sameCoord(selected, sq.coord),
    target: targets.some((t) => sameCoord(t, sq.coord)),
  }));
}

/** Rank 8 first; piece letters, `.` for empty squares. */
export function renderBoardText(state: GameState): string {
  const lines: string[] = [];
  for (let rank = BOARD_SIZE - 1; rank >= 0; rank--) {
    let line = "";
    for (let file = 0; file < BOARD_SIZE; file++) {
      const p = pieceAt(state.board, { file, rank });
      line += p ? pieceLetter(p) : ".";
    }
    lines.push(line);
  }
  return lines.join("\n");
}
