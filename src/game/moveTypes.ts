import type { Square } from "./coords.ts";
import { parseSquare, squareName, isValidMove } from "./coords.ts";

export interface Move {
  readonly from: Square;
  readonly to: Square;
  /** Set by Board.makeMove when the destination held an enemy piece. */
  readonly capture: boolean;
}

export function mv(from: Square, to: Square): Move {
  return { from, to, capture: false };
}

export function captureMove(move: Move): Move {
  if (move.capture) return move;
  return { from: move.from, to: move.to, capture: true };
}

export function movesEqual(a: Move, b: Move): boolean {
  return a.from === b.from && a.to === b.to && a.capture === b.capture;
}

export function formatMove(move: Move): string {
  return `${squareName(move.from)}-${squareName(move.to)}`;
}

/** Parses "c4-f4". Returns null for text that is not two squares on one line. */
export function parseMove(text: string): Move | null {
  const parts = text.trim().split("-");
  if (parts.length !== 2) return null;
  const from = parseSquare(parts[0]);
  const to = parseSquare(parts[1]);
  if (!from || !to || !isValidMove(from, to)) return null;
  return mv(from, to);
}
