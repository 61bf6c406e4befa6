// Package entry: the rules core, then the controller, board view and player seats built on it.

export type { Piece, PieceKind, Player, PromotionKind } from "../types.ts";
export type { Coord } from "../game/coords.ts";
export type { Board, Square } from "../game/board.ts";
export type { GameState, LayoutOptions } from "../game/state.ts";
export type { Move, PerformedMove, CastleMove, DoublePushMove, EnPassantMove, NormalMove, PromotionMove } from "../game/moveTypes.ts";
export type { GameOverResult } from "../game/gameOver.ts";
export type { SquareView } from "../render/boardView.ts";

export { opponentOf } from "../types.ts";
export { makeCoord, sameCoord } from "../game/coords.ts";
export { coordToText, parseCoordText, performedMoveToText } from "../game/coordFormat.ts";
export { pieceAt } from "../game/board.ts";
export { cloneGameState, createGameStateFromLayout, createInitialGameState } from "../game/state.ts";
export { generatePseudoLegalDestinations } from "../game/movegenPseudo.ts";
export { findKing, hasKing, isInCheck } from "../game/attack.ts";
export { filterLegalDestinations } from "../game/legality.ts";
export { generateCastlingMoves, generateLegalMovesForPlayer, getMoves } from "../game/movegen.ts";
export { findMoveTo, isMoveTo } from "../game/moveTypes.ts";
export { applyMove } from "../game/applyMove.ts";
export { endTurn } from "../game/endTurn.ts";
export { checkCurrentPlayerLost } from "../game/gameOver.ts";
export { hashGameState } from "../game/hashState.ts";
export { describeBoard, renderBoardText } from "../render/boardView.ts";

export { GameController } from "../controller/gameController.ts";
export { GameCoordinator } from "../player/gameCoordinator.ts";
export { MirrorPlayer } from "../player/mirrorPlayer.ts";
export { HumanPlayer } from "../player/humanPlayer.ts";
export { RandomPlayer } from "../player/randomPlayer.ts";
export type { MoveMessage, ResyncMessage, SeatMessage } from "../player/playerTypes.ts";
export { isMoveMessage, isResyncMessage, isSeatMessage } from "../player/playerTypes.ts";
export { pickRandomMove } from "../bot/randomMove.ts";
export type { Prng } from "../shared/prng.ts";
export type { EngineConfig } from "../shared/engineConfig.ts";
export { createPrng } from "../shared/prng.ts";
export { readEngineConfig } from "../shared/engineConfig.ts";
