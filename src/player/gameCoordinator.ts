import { MessageChannel, receiveMessageOnPort } from "node:worker_threads";
import type { Player } from "../types.ts";
import type { Move } from "../game/moveTypes.ts";
import type { GameState } from "../game/state.ts";
import type { GameOverResult } from "../game/gameOver.ts";
import type { MirrorPlayer } from "./mirrorPlayer.ts";
import type { MoveMessage, ResyncMessage } from "./playerTypes.ts";
import { opponentOf } from "../types.ts";
import { pieceAt } from "../game/board.ts";
import { sameCoord } from "../game/coords.ts";
import { performedMoveToText } from "../game/coordFormat.ts";
import { applyMove } from "../game/applyMove.ts";
import { endTurn } from "../game/endTurn.ts";
import { checkCurrentPlayerLost } from "../game/gameOver.ts";
import { getMoves } from "../game/movegen.ts";
import { cloneGameState, createInitialGameState } from "../game/state.ts";
import { logDebug, logWarn } from "../shared/log.ts";
import { isMoveMessage } from "./playerTypes.ts";

type Seat = {
  player: MirrorPlayer;
  /** coordinator -> player */
  toPlayer: MessageChannel;
  /** player -> coordinator */
  fromPlayer: MessageChannel;
};

/**
 * Owns the authoritative game. Each tick lets every player poll once, then takes
 * at most one move from each, applies it when legal and forwards it to the other seat.
 */
export class GameCoordinator {
  private state: GameState;
  private seats: Map<Player, Seat>;
  private result: GameOverResult = { winner: null, reason: null };

  constructor(white: MirrorPlayer, black: MirrorPlayer, state: GameState = createInitialGameState()) {
    if (white.side !== "W" || black.side !== "B") {
      throw new Error("GameCoordinator: players must sit as White then Black");
    }
    this.state = state;
    this.seats = new Map();

    for (const player of [white, black]) {
      const seat: Seat = { player, toPlayer: new MessageChannel(), fromPlayer: new MessageChannel() };
      player.attach({ inbox: seat.toPlayer.port2, outbox: seat.fromPlayer.port1, state });
      this.seats.set(player.side, seat);
    }

    this.result = checkCurrentPlayerLost(this.state);
  }

  getState(): GameState {
    return this.state;
  }

  getResult(): GameOverResult {
    return this.result;
  }

  isOver(): boolean {
    return this.result.reason !== null;
  }

  /**
   * Returns true when a move was applied to the authoritative state. Once the
   * game is over a tick only lets the players catch up on forwarded moves.
   */
  tick(): boolean {
    if (this.isOver()) {
      for (const seat of this.seats.values()) seat.player.sync();
      return false;
    }

    let applied = false;
    for (const [side, seat] of this.seats) {
      if (this.isOver()) break;
      seat.player.tick();

      const received = receiveMessageOnPort(seat.fromPlayer.port2);
      if (!received) continue;
      const raw: unknown = received.message;
      if (!isMoveMessage(raw)) {
        logWarn("coordinator", `dropped malformed message from ${side}`, raw);
        this.resync(side);
        continue;
      }
      if (this.accept(side, raw)) applied = true;
    }
    return applied;
  }

  /**
   * Tick until the game ends, `maxPlies` moves have been applied, or two ticks in
   * a row apply nothing. Returns the number of moves applied.
   */
  play(maxPlies: number): number {
    let plies = 0;
    let idleTicks = 0;
    while (plies < maxPlies && !this.isOver() && idleTicks < 2) {
      if (this.tick()) {
        plies++;
        idleTicks = 0;
      } else {
        idleTicks++;
      }
    }
    return plies;
  }

  close(): void {
    for (const seat of this.seats.values()) {
      seat.toPlayer.port1.close();
      seat.fromPlayer.port1.close();
    }
  }

  private accept(side: Player, msg: MoveMessage): boolean {
    const move = this.resolveLegal(side, msg.move);
    if (!move) {
      logWarn("coordinator", `rejected move from ${side}`, msg.move);
      this.resync(side);
      return false;
    }

    const before = this.state.history.length;
    applyMove(this.state, move);
    endTurn(this.state);
    logDebug("coordinator", `${side} played ${this.state.history.slice(before).map(performedMoveToText).join(" ")}`);

    const forward: MoveMessage = { kind: "move", move };
    const other = this.seats.get(opponentOf(side));
    if (other) other.toPlayer.port1.postMessage(forward);

    this.result = checkCurrentPlayerLost(this.state);
    if (this.result.reason) logDebug("coordinator", this.result.reason);
    return true;
  }

  /** The seat already applied its rejected move to its mirror; send it the real position back. */
  private resync(side: Player): void {
    const seat = this.seats.get(side);
    if (!seat) return;
    const msg: ResyncMessage = { kind: "resync", state: cloneGameState(this.state) };
    seat.toPlayer.port1.postMessage(msg);
  }

  /** The authoritative twin of `candidate`, or null when it is not legal here. */
  private resolveLegal(side: Player, candidate: Move): Move | null {
    if (side !== this.state.toMove) return null;
    const piece = pieceAt(this.state.board, candidate.from);
    if (!piece || piece.owner !== side) return null;

    const promoteTo = candidate.kind === "promotion" ? candidate.promoteTo : this.state.promotionChoice;
    const legal = getMoves(this.state, candidate.from, true, promoteTo);
    return legal.find((m) => m.kind === candidate.kind && sameCoord(m.to, candidate.to)) ?? null;
  }
}
