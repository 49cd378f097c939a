import type { Piece, Player } from "../types.ts";
import { ALL_SQUARES, adjacentSquares } from "./coords.ts";

export type RegionSizes = Record<Player, number[]>;

/**
 * Sizes of every 8-connected group of same-coloured pieces, per side,
 * largest first. Uses an explicit worklist rather than recursion.
 */
export function computeRegionSizes(cells: readonly Piece[]): RegionSizes {
  const out: RegionSizes = { W: [], B: [] };
  const visited = new Uint8Array(cells.length);
  const stack: number[] = [];

  for (const start of ALL_SQUARES) {
    const owner = cells[start.index];
    if (owner === "E" || visited[start.index]) continue;

    let size = 0;
    visited[start.index] = 1;
    stack.push(start.index);
    while (stack.length > 0) {
      const idx = stack.pop();
      if (idx === undefined) break;
      size++;
      for (const n of adjacentSquares(ALL_SQUARES[idx])) {
        if (visited[n.index] || cells[n.index] !== owner) continue;
        visited[n.index] = 1;
        stack.push(n.index);
      }
    }
    out[owner].push(size);
  }

  out.W.sort((a, b) => b - a);
  out.B.sort((a, b) => b - a);
  return out;
}

/** One group only. A side with no pieces is not contiguous. */
export function isContiguous(sizes: readonly number[]): boolean {
  return sizes.length === 1;
}

export function totalPieces(sizes: readonly number[]): number {
  let n = 0;
  for (const s of sizes) n += s;
  return n;
}
