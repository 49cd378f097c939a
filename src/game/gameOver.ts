import type { Board } from "./board.ts";
import type { Piece } from "../types.ts";
import { pieceFullName } from "../types.ts";

/**
 * Check if the game is over and describe the result.
 * @returns winner ("E" for a tie) and reason, or nulls if the game continues
 */
export function getWinner(board: Board): { winner: Piece | null; reason: string | null } {
  const winner = board.winner();
  if (winner === null) return { winner: null, reason: null };

  if (winner === "E") {
    const boardEmpty = board.numPieces("W") === 0 && board.numPieces("B") === 0;
    if (boardEmpty) return { winner, reason: "Draw — no pieces left on the board" };
    return { winner, reason: `Draw — move limit of ${board.moveLimit()} reached` };
  }

  const loser = winner === "W" ? "B" : "W";
  if (board.numPieces(loser) === 0) {
    return { winner, reason: `${pieceFullName(winner)} wins — ${pieceFullName(loser)} has no pieces` };
  }
  return { winner, reason: `${pieceFullName(winner)} wins — all pieces connected` };
}
