import type { Board } from "./board.ts";
import { BOARD_SIZE, sq } from "./coords.ts";
import { pieceAbbrev, pieceFullName } from "../types.ts";

/** Multi-line dump of the position, rank 8 first, for logs and test failures. */
export function formatBoard(board: Board): string {
  const lines: string[] = ["==="];
  for (let row = BOARD_SIZE - 1; row >= 0; row--) {
    const cells: string[] = [];
    for (let col = 0; col < BOARD_SIZE; col++) cells.push(pieceAbbrev(board.get(sq(col, row))));
    lines.push(`    ${cells.join(" ")}`);
  }
  lines.push(`Next move: ${pieceFullName(board.turn())}`);
  lines.push("===");
  return lines.join("\n");
}
