import type { MessagePort } from "node:worker_threads";
import { receiveMessageOnPort } from "node:worker_threads";
import type { Player } from "../types.ts";
import type { Move } from "../game/moveTypes.ts";
import type { GameState } from "../game/state.ts";
import type { MoveMessage, SeatLink, SeatMessage } from "./playerTypes.ts";
import { applyMove } from "../game/applyMove.ts";
import { endTurn } from "../game/endTurn.ts";
import { cloneGameState, createInitialGameState } from "../game/state.ts";
import { logDebug, logWarn } from "../shared/log.ts";
import { isSeatMessage } from "./playerTypes.ts";

/**
 * A seat at the table. Keeps its own mirror of the game, fed by the moves the
 * coordinator forwards, and sends its own moves when the mirror says it is its turn.
 */
export abstract class MirrorPlayer {
  readonly side: Player;
  protected mirror: GameState;
  private inbox: MessagePort | null = null;
  private outbox: MessagePort | null = null;

  constructor(side: Player) {
    this.side = side;
    this.mirror = createInitialGameState();
  }

  attach(link: SeatLink): void {
    this.inbox = link.inbox;
    this.outbox = link.outbox;
    this.mirror = cloneGameState(link.state);
  }

  getMirror(): GameState {
    return this.mirror;
  }

  /**
   * One poll: handle a single incoming message if there is one; otherwise, on
   * our turn, choose a move, send it and apply it locally. A rejected move comes
   * back as a resync that replaces the mirror.
   */
  tick(): void {
    const incoming = this.receive();
    if (incoming) {
      this.handle(incoming);
      return;
    }

    if (!this.outbox || this.mirror.toMove !== this.side) return;

    const move = this.chooseMove(this.mirror);
    if (!move) return;

    const msg: MoveMessage = { kind: "move", move };
    this.outbox.postMessage(msg);
    this.play(move);
    logDebug(`player-${this.side}`, `sent ${move.kind}`);
  }

  /** Handle every pending incoming message without choosing a move of our own. Returns how many were handled. */
  sync(): number {
    let handled = 0;
    for (let incoming = this.receive(); incoming; incoming = this.receive()) {
      this.handle(incoming);
      handled++;
    }
    return handled;
  }

  protected abstract chooseMove(view: GameState): Move | null;

  private handle(msg: SeatMessage): void {
    if (msg.kind === "move") {
      this.play(msg.move);
      return;
    }
    this.mirror = cloneGameState(msg.state);
    logDebug(`player-${this.side}`, "mirror resynced");
  }

  private play(move: Move): void {
    applyMove(this.mirror, move);
    endTurn(this.mirror);
  }

  private receive(): SeatMessage | null {
    if (!this.inbox) return null;
    const received = receiveMessageOnPort(this.inbox);
    if (!received) return null;
    const raw: unknown = received.message;
    if (!isSeatMessage(raw)) {
      logWarn(`player-${this.side}`, "dropped malformed message", raw);
      return null;
    }
    return raw;
  }
}
