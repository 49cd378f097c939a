// "Core" is the stable, deterministic engine surface (no I/O beyond opt-in logging).

export type { Piece, Player } from "../types.ts";
export { opposite, oppositePiece, pieceAbbrev, pieceFullName } from "../types.ts";

export type { Square } from "../game/coords.ts";
export {
  ALL_SQUARES,
  BOARD_SIZE,
  adjacentSquares,
  directionTo,
  distanceTo,
  isValidMove,
  moveDest,
  parseSquare,
  sq,
  squareName,
} from "../game/coords.ts";

export type { Move } from "../game/moveTypes.ts";
export { captureMove, formatMove, movesEqual, mv, parseMove } from "../game/moveTypes.ts";

export type { Layout } from "../game/initialPosition.ts";
export { INITIAL_PIECES, layoutFromRows } from "../game/initialPosition.ts";

export { Board } from "../game/board.ts";
export { computeRegionSizes } from "../game/regions.ts";
export { regionHeuristic } from "../game/heuristic.ts";
export { getWinner } from "../game/gameOver.ts";
export { hashBoard } from "../game/hashState.ts";
export { formatBoard } from "../game/boardFormat.ts";
export { RULES } from "../game/rules.ts";
export { ConfigurationError, EngineError, PreconditionError } from "../game/errors.ts";

export type { SearchOptions, SearchResult } from "../ai/aiTypes.ts";
export { chooseMove, search, searchForMove } from "../ai/search.ts";
export { INFTY, WINNING_VALUE, terminalScore } from "../ai/evaluate.ts";
