import type { GameState } from "./state.ts";
import type { Player } from "../types.ts";
import { opponentOf } from "../types.ts";
import { hasKing, isInCheck } from "./attack.ts";
import { hasAnyLegalMove } from "./movegen.ts";

export interface GameOverResult {
  winner: Player | null;
  reason: string | null;
}

function playerName(p: Player): string {
  return p === "W" ? "White" : "Black";
}

/**
 * Check whether the side to move has been checkmated.
 * Only checkmate ends the game; a side with no moves while not in check plays on.
 * Castling may leave a king en prise, so a side whose king was taken has lost too.
 */
export function checkCurrentPlayerLost(state: GameState): GameOverResult {
  const loser = state.toMove;
  const winner = opponentOf(loser);

  if (!hasKing(state, loser)) {
    return { winner, reason: `${playerName(winner)} wins — ${playerName(loser)}'s king was captured` };
  }
  if (!isInCheck(state, loser)) return { winner: null, reason: null };
  if (hasAnyLegalMove(state, loser)) return { winner: null, reason: null };

  return { winner, reason: `${playerName(winner)} wins — ${playerName(loser)} is checkmated` };
}
