import { Board } from "../game/board.ts";
import type { Move } from "../game/moveTypes.ts";
import { formatMove } from "../game/moveTypes.ts";
import { DEFAULT_SEARCH_DEPTH } from "../game/rules.ts";
import { ConfigurationError, PreconditionError } from "../game/errors.ts";
import { isSearchLogEnabled } from "../config.ts";
import { INFTY, terminalScore } from "./evaluate.ts";
import type { NodeResult, SearchOptions, SearchResult, SearchStats, Sense } from "./aiTypes.ts";

function flip(sense: Sense): Sense {
  return sense === 1 ? -1 : 1;
}

function findMove(
  board: Board,
  depth: number,
  saveMove: boolean,
  sense: Sense,
  alpha: number,
  beta: number,
  stats: SearchStats
): NodeResult {
  stats.nodes++;

  const term = terminalScore(board);
  if (term !== null) return { score: term, move: null };

  if (depth <= 0) return { score: board.heuristicEstimate(), move: null };

  // A side with no legal moves keeps the worst score for itself.
  let bestScore = -sense * INFTY;
  let bestMove: Move | null = null;

  for (const m of board.legalMoves()) {
    const score = board.withMove(m, () => findMove(board, depth - 1, false, flip(sense), alpha, beta, stats).score);

    if (sense === 1 ? score > bestScore : score < bestScore) {
      bestScore = score;
      if (saveMove) bestMove = m;
    }

    if (sense === 1) alpha = Math.max(alpha, score);
    else beta = Math.min(beta, score);
    if (alpha >= beta) break;
  }

  return { score: bestScore, move: bestMove };
}

/**
 * Fixed-depth minimax with alpha-beta pruning from `board`, which is mutated
 * and restored along the way. The returned move is the first one reaching the
 * best score for `sense`; it is null when the position is terminal or depth is 0.
 */
export function search(
  board: Board,
  depth: number,
  sense: Sense,
  alpha: number,
  beta: number,
  stats: SearchStats = { nodes: 0 }
): NodeResult {
  return findMove(board, depth, true, sense, alpha, beta, stats);
}

export function searchForMove(board: Board, options: SearchOptions = {}): SearchResult {
  const depth = options.depth ?? DEFAULT_SEARCH_DEPTH;
  if (!Number.isInteger(depth) || depth < 1) {
    throw new ConfigurationError("CONFIG_SEARCH_DEPTH", `searchForMove: depth must be a positive integer, got ${depth}`, {
      depth,
    });
  }

  const work = Board.copyOf(board);
  if (work.gameOver()) {
    throw new PreconditionError("PRECONDITION_NO_MOVES", "searchForMove: game is already over", { winner: work.winner() });
  }

  const sense: Sense = work.turn() === "W" ? 1 : -1;
  const stats: SearchStats = { nodes: 0 };
  const start = performance.now();
  const { score, move } = search(work, depth, sense, -INFTY, INFTY, stats);
  const ms = Math.round(performance.now() - start);

  if (!move) {
    throw new PreconditionError("PRECONDITION_NO_MOVES", `searchForMove: ${work.turn()} has no legal moves`);
  }

  if (options.log ?? isSearchLogEnabled()) {
    console.log(
      `[loa] [search] ${work.turn()} plays ${formatMove(move)} score=${score} depth=${depth} nodes=${stats.nodes} ms=${ms}`
    );
  }

  return { move, score, depth, nodes: stats.nodes, ms };
}

/** Best move for the side to move. The caller's board is left untouched. */
export function chooseMove(board: Board, options: SearchOptions = {}): Move {
  return searchForMove(board, options).move;
}
