import type { MessagePort } from "node:worker_threads";
import type { Coord } from "../game/coords.ts";
import type { Move } from "../game/moveTypes.ts";
import type { GameState } from "../game/state.ts";
import { SQUARE_COUNT } from "../game/board.ts";
import { inBounds } from "../game/coords.ts";
import { pieceFromLetter } from "../pieces/pieceLabel.ts";

export type MoveMessage = {
  kind: "move";
  move: Move;
};

/** Sent to a seat whose move was rejected: replace the mirror with this position. */
export type ResyncMessage = {
  kind: "resync";
  state: GameState;
};

export type SeatMessage = MoveMessage | ResyncMessage;

/** What a player is handed when it takes a seat: its two one-way ports and the starting position. */
export type SeatLink = {
  inbox: MessagePort;
  outbox: MessagePort;
  state: GameState;
};

const MOVE_KINDS: readonly string[] = ["normal", "doublePush", "enPassant", "castle", "promotion"];
const PROMOTION_KINDS: readonly string[] = ["Q", "R", "B", "N"];
const PLAYERS: readonly string[] = ["W", "B"];

function isCoord(raw: unknown): raw is Coord {
  if (typeof raw !== "object" || raw === null) return false;
  if (!("file" in raw) || !("rank" in raw)) return false;
  const { file, rank } = raw;
  return typeof file === "number" && typeof rank === "number" && Number.isInteger(file) && Number.isInteger(rank) && inBounds(file, rank);
}

function isMove(raw: unknown): raw is Move {
  if (typeof raw !== "object" || raw === null) return false;
  if (!("kind" in raw) || typeof raw.kind !== "string" || !MOVE_KINDS.includes(raw.kind)) return false;
  if (!("from" in raw) || !("to" in raw) || !isCoord(raw.from) || !isCoord(raw.to)) return false;

  switch (raw.kind) {
    case "promotion":
      return "promoteTo" in raw && typeof raw.promoteTo === "string" && PROMOTION_KINDS.includes(raw.promoteTo);
    case "enPassant":
      return "captured" in raw && isCoord(raw.captured);
    case "castle":
      return (
        "long" in raw &&
        typeof raw.long === "boolean" &&
        "player" in raw &&
        typeof raw.player === "string" &&
        PLAYERS.includes(raw.player)
      );
    default:
      return true;
  }
}

function isPiece(raw: unknown): boolean {
  if (raw === null) return true;
  if (typeof raw !== "object") return false;
  if (!("owner" in raw) || !("kind" in raw) || !("hasMoved" in raw) || !("enPassantable" in raw)) return false;
  if (typeof raw.owner !== "string" || typeof raw.kind !== "string") return false;
  const letter = raw.owner === "W" ? raw.kind : raw.kind.toLowerCase();
  return (
    PLAYERS.includes(raw.owner) &&
    pieceFromLetter(letter) !== null &&
    typeof raw.hasMoved === "boolean" &&
    typeof raw.enPassantable === "boolean"
  );
}

function isGameState(raw: unknown): raw is GameState {
  if (typeof raw !== "object" || raw === null) return false;
  if (!("board" in raw) || !("toMove" in raw) || !("history" in raw) || !("promotionChoice" in raw)) return false;
  const { board, toMove, history, promotionChoice } = raw;

  if (typeof toMove !== "string" || !PLAYERS.includes(toMove)) return false;
  if (typeof promotionChoice !== "string" || !PROMOTION_KINDS.includes(promotionChoice)) return false;
  if (!Array.isArray(history) || !history.every((m) => typeof m === "object" && m !== null && "from" in m && "to" in m && isCoord(m.from) && isCoord(m.to))) {
    return false;
  }
  if (!Array.isArray(board) || board.length !== SQUARE_COUNT) return false;
  return board.every(
    (sq, i) =>
      typeof sq === "object" &&
      sq !== null &&
      "coord" in sq &&
      "piece" in sq &&
      isCoord(sq.coord) &&
      sq.coord.file + 8 * sq.coord.rank === i &&
      isPiece(sq.piece)
  );
}

// Structural checks only; legality is decided against the receiver's own state.
export function isMoveMessage(raw: unknown): raw is MoveMessage {
  if (typeof raw !== "object" || raw === null) return false;
  if (!("kind" in raw) || raw.kind !== "move" || !("move" in raw)) return false;
  return isMove(raw.move);
}

export function isResyncMessage(raw: unknown): raw is ResyncMessage {
  if (typeof raw !== "object" || raw === null) return false;
  if (!("kind" in raw) || raw.kind !== "resync" || !("state" in raw)) return false;
  return isGameState(raw.state);
}

export function isSeatMessage(raw: unknown): raw is SeatMessage {
  return isMoveMessage(raw) || isResyncMessage(raw);
}
