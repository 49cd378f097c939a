import type { Board } from "./board.ts";
import { ALL_SQUARES } from "./coords.ts";
import { pieceAbbrev } from "../types.ts";

/**
 * A string key for the position: all 64 cells in scan order plus the side to
 * move. Move history and the move limit are not part of the key.
 */
export function hashBoard(board: Board): string {
  let cells = "";
  for (const s of ALL_SQUARES) cells += pieceAbbrev(board.get(s));
  return `${cells}|toMove:${board.turn()}`;
}
