import type { Player } from "../types.ts";
import type { Move } from "../game/moveTypes.ts";
import type { GameState } from "../game/state.ts";
import type { Prng } from "../shared/prng.ts";
import { pickRandomMove } from "../bot/randomMove.ts";
import { readEngineConfig } from "../shared/engineConfig.ts";
import { createPrng } from "../shared/prng.ts";
import { MirrorPlayer } from "./mirrorPlayer.ts";

export class RandomPlayer extends MirrorPlayer {
  private prng: Prng;

  /** Without a seed, `CHESS_RANDOM_SEED` is used, then the clock. */
  constructor(side: Player, seed?: number | string) {
    super(side);
    this.prng = createPrng(seed ?? readEngineConfig().randomSeed ?? Date.now());
  }

  protected chooseMove(view: GameState): Move | null {
    return pickRandomMove(view, this.prng);
  }
}
