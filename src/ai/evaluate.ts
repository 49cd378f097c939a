import type { Board } from "../game/board.ts";

/** A magnitude larger than any score. */
export const INFTY = 2 ** 31 - 1;

/** Score of a won position: positive for White, negative for Black. */
export const WINNING_VALUE = INFTY - 20;

/** Win/loss/tie score for a finished game, or null while play continues. */
export function terminalScore(board: Board): number | null {
  const winner = board.winner();
  if (winner === null) return null;
  if (winner === "W") return WINNING_VALUE;
  if (winner === "B") return -WINNING_VALUE;
  return 0;
}
