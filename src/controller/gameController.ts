import type { Player, PromotionKind } from "../types.ts";
import type { Coord } from "../game/coords.ts";
import type { GameState } from "../game/state.ts";
import type { SquareView } from "../render/boardView.ts";
import { pieceAt } from "../game/board.ts";
import { sameCoord } from "../game/coords.ts";
import { coordToText, performedMoveToText } from "../game/coordFormat.ts";
import { applyMove } from "../game/applyMove.ts";
import { hasKing } from "../game/attack.ts";
import { endTurn } from "../game/endTurn.ts";
import { checkCurrentPlayerLost } from "../game/gameOver.ts";
import { findMoveTo } from "../game/moveTypes.ts";
import { getMoves } from "../game/movegen.ts";
import { createInitialGameState } from "../game/state.ts";
import { describeBoard } from "../render/boardView.ts";
import { logDebug } from "../shared/log.ts";

/**
 * Selection and turn handling on top of the rules core, for an input layer that
 * works in "pick a piece, then pick a square" clicks.
 */
export class GameController {
  private state: GameState;
  private selected: Coord | null = null;
  private winner: Player | null = null;
  private overReason: string | null = null;

  constructor(state: GameState = createInitialGameState()) {
    this.state = state;
    this.refreshGameOver();
  }

  getState(): GameState {
    return this.state;
  }

  setState(state: GameState): void {
    this.state = state;
    this.selected = null;
    this.refreshGameOver();
  }

  getSelected(): Coord | null {
    return this.selected;
  }

  isOver(): boolean {
    return this.overReason !== null;
  }

  getWinner(): Player | null {
    return this.winner;
  }

  getOverReason(): string | null {
    return this.overReason;
  }

  setPromotionChoice(kind: PromotionKind): void {
    this.state.promotionChoice = kind;
  }

  /** Only a piece of the side to move can be selected, and only while the game runs. */
  selectSquare(coord: Coord): boolean {
    if (this.isOver()) return false;
    const piece = pieceAt(this.state.board, coord);
    if (!piece || piece.owner !== this.state.toMove) return false;
    this.selected = coord;
    return true;
  }

  clearSelection(): void {
    this.selected = null;
  }

  getLegalTargets(): Coord[] {
    if (!this.selected) return [];
    return getMoves(this.state, this.selected, true).map((m) => m.to);
  }

  /**
   * Move the selected piece to `target`. Returns false, leaving the position
   * untouched, when there is no selection or the target is not a legal destination.
   * The selection is cleared either way.
   */
  attemptMove(target: Coord): boolean {
    const from = this.selected;
    this.selected = null;
    if (!from || this.isOver()) return false;
    if (sameCoord(from, target)) return false;

    const mover = pieceAt(this.state.board, from);
    const occupant = pieceAt(this.state.board, target);
    if (!mover || (occupant && occupant.owner === mover.owner)) return false;

    const move = findMoveTo(getMoves(this.state, from, true), target);
    if (!move) return false;

    applyMove(this.state, move);
    endTurn(this.state);
    logDebug("controller", `${move.kind} ${coordToText(from)}-${coordToText(target)}`);

    this.refreshGameOver();
    return true;
  }

  getStatusText(): string {
    if (this.isOver()) return hasKing(this.state, this.state.toMove) ? "checkmate!" : "king captured!";
    return `${this.state.toMove === "W" ? "White" : "Black"} to play`;
  }

  getHistoryText(): string[] {
    return this.state.history.map(performedMoveToText);
  }

  describeSquares(): SquareView[] {
    return describeBoard(this.state, { selected: this.selected, targets: this.getLegalTargets() });
  }

  private refreshGameOver(): void {
    const result = checkCurrentPlayerLost(this.state);
    this.winner = result.winner;
    this.overReason = result.reason;
    if (result.reason) logDebug("controller", result.reason);
  }
}
