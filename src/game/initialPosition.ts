import type { Piece } from "../types.ts";
import { BOARD_SIZE } from "./coords.ts";
import { ConfigurationError } from "./errors.ts";

/**
 * An 8×8 placement indexed `[row][col]`, bottom row (rank 1) first.
 *
 * Written out as an array literal this puts rank 1 at the top of the source,
 * so fixtures are usually built with `layoutFromRows`, which takes the ranks
 * in reading order instead.
 */
export type Layout = ReadonlyArray<ReadonlyArray<Piece>>;

const E = "E";
const W = "W";
const B = "B";

export const INITIAL_PIECES: Layout = [
  [E, B, B, B, B, B, B, E],
  [W, E, E, E, E, E, E, W],
  [W, E, E, E, E, E, E, W],
  [W, E, E, E, E, E, E, W],
  [W, E, E, E, E, E, E, W],
  [W, E, E, E, E, E, E, W],
  [W, E, E, E, E, E, E, W],
  [E, B, B, B, B, B, B, E],
];

function pieceFromChar(ch: string): Piece | null {
  if (ch === "w" || ch === "W") return "W";
  if (ch === "b" || ch === "B") return "B";
  if (ch === "-" || ch === ".") return "E";
  return null;
}

/**
 * Builds a layout from eight rank strings, rank 8 first, e.g.
 * `"-bbbbbb-"`. Whitespace inside a rank is ignored.
 */
export function layoutFromRows(rows: readonly string[]): Layout {
  if (rows.length !== BOARD_SIZE) {
    throw new ConfigurationError("CONFIG_BAD_LAYOUT", `layoutFromRows: expected ${BOARD_SIZE} rows, got ${rows.length}`);
  }
  const out: Piece[][] = [];
  for (let i = rows.length - 1; i >= 0; i--) {
    const cells = rows[i].replace(/\s+/g, "");
    if (cells.length !== BOARD_SIZE) {
      throw new ConfigurationError("CONFIG_BAD_LAYOUT", `layoutFromRows: rank ${i + 1} from the top has ${cells.length} cells`, {
        row: rows[i],
      });
    }
    const rank: Piece[] = [];
    for (const ch of cells) {
      const p = pieceFromChar(ch);
      if (p === null) {
        throw new ConfigurationError("CONFIG_BAD_LAYOUT", `layoutFromRows: unknown piece "${ch}"`, { row: rows[i] });
      }
      rank.push(p);
    }
    out.push(rank);
  }
  return out;
}

export function assertLayoutShape(layout: Layout): void {
  if (layout.length !== BOARD_SIZE || layout.some((rank) => rank.length !== BOARD_SIZE)) {
    throw new ConfigurationError("CONFIG_BAD_LAYOUT", `layout must be ${BOARD_SIZE}×${BOARD_SIZE}`);
  }
}
