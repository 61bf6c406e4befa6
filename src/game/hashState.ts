import type { GameState } from "./state.ts";
import { coordToText, performedMoveToText } from "./coordFormat.ts";
import { pieceLetter } from "../pieces/pieceLabel.ts";

/**
 * Stable text key for a game state. Two states with the same hash have the
 * same pieces and flags on the same squares, side to move, promotion choice
 * and history.
 */
export function hashGameState(state: GameState): string {
  const parts: string[] = [];

  for (const sq of state.board) {
    if (!sq.piece) continue;
    const flags = `${sq.piece.hasMoved ? "m" : "-"}${sq.piece.enPassantable ? "e" : "-"}`;
    parts.push(`${coordToText(sq.coord)}${pieceLetter(sq.piece)}${flags}`);
  }

  parts.push(`toMove:${state.toMove}`);
  parts.push(`promote:${state.promotionChoice}`);
  parts.push(`history:${state.history.map(performedMoveToText).join(",")}`);

  return parts.join("|");
}
