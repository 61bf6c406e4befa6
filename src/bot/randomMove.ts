import type { Move } from "../game/moveTypes.ts";
import type { GameState } from "../game/state.ts";
import type { Prng } from "../shared/prng.ts";
import { generateLegalMovesForPlayer } from "../game/movegen.ts";

/** Uniform choice among every legal move of the side to move; null when there is none. */
export function pickRandomMove(state: GameState, prng: Prng): Move | null {
  const legal = generateLegalMovesForPlayer(state, state.toMove);
  if (legal.length === 0) return null;
  return prng.pick(legal);
}
