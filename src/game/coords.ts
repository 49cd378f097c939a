import { PreconditionError } from "./errors.ts";

export const BOARD_SIZE = 8;

export interface Square {
  readonly col: number;
  readonly row: number;
  /** col + BOARD_SIZE * row */
  readonly index: number;
}

const SQUARE_NAME_RE = /^[a-h][1-8]$/;

// N, NE, E, SE, S, SW, W, NW as (dc, dr).
export const DIR_DELTAS: ReadonlyArray<readonly [number, number]> = [
  [0, 1],
  [1, 1],
  [1, 0],
  [1, -1],
  [0, -1],
  [-1, -1],
  [-1, 0],
  [-1, 1],
];

function buildSquares(): readonly Square[] {
  const out: Square[] = [];
  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let col = 0; col < BOARD_SIZE; col++) {
      out.push(Object.freeze({ col, row, index: col + BOARD_SIZE * row }));
    }
  }
  return Object.freeze(out);
}

/** All 64 squares in index (scan) order: a1, b1, ..., h1, a2, ... */
export const ALL_SQUARES: readonly Square[] = buildSquares();

export function inBounds(col: number, row: number): boolean {
  return Number.isInteger(col) && Number.isInteger(row) && col >= 0 && col < BOARD_SIZE && row >= 0 && row < BOARD_SIZE;
}

export function sq(col: number, row: number): Square {
  if (!inBounds(col, row)) {
    throw new PreconditionError("PRECONDITION_BAD_SQUARE", `sq: (${col}, ${row}) is off the board`, { col, row });
  }
  return ALL_SQUARES[col + BOARD_SIZE * row];
}

export function isSquareName(text: string): boolean {
  return SQUARE_NAME_RE.test(text);
}

export function squareName(s: Square): string {
  return `${String.fromCharCode("a".charCodeAt(0) + s.col)}${s.row + 1}`;
}

export function parseSquare(text: string): Square | null {
  if (!isSquareName(text)) return null;
  return sq(text.charCodeAt(0) - "a".charCodeAt(0), Number(text[1]) - 1);
}

/** Like parseSquare, for names known to be valid (fixtures, tests). */
export function squareNamed(text: string): Square {
  const s = parseSquare(text);
  if (!s) throw new PreconditionError("PRECONDITION_BAD_SQUARE", `squareNamed: invalid square name "${text}"`, { text });
  return s;
}

/** The square `steps` squares from `s` in direction `dir`, or null when off the board. */
export function moveDest(s: Square, dir: number, steps: number): Square | null {
  const delta = DIR_DELTAS[dir];
  if (delta === undefined) return null;
  const col = s.col + delta[0] * steps;
  const row = s.row + delta[1] * steps;
  if (!inBounds(col, row)) return null;
  return ALL_SQUARES[col + BOARD_SIZE * row];
}

const ADJACENT: readonly (readonly Square[])[] = ALL_SQUARES.map((s) => {
  const out: Square[] = [];
  for (let dir = 0; dir < DIR_DELTAS.length; dir++) {
    const next = moveDest(s, dir, 1);
    if (next) out.push(next);
  }
  return out;
});

export function adjacentSquares(s: Square): readonly Square[] {
  return ADJACENT[s.index];
}

export function isAdjacent(a: Square, b: Square): boolean {
  return a !== b && Math.abs(a.col - b.col) <= 1 && Math.abs(a.row - b.row) <= 1;
}

/** Direction index 0..7 from `from` to `to`, or -1 when they share no line. */
export function directionTo(from: Square, to: Square): number {
  const dc = to.col - from.col;
  const dr = to.row - from.row;
  if (dc === 0 && dr === 0) return -1;
  if (dc !== 0 && dr !== 0 && Math.abs(dc) !== Math.abs(dr)) return -1;
  const sc = Math.sign(dc);
  const sr = Math.sign(dr);
  return DIR_DELTAS.findIndex(([c, r]) => c === sc && r === sr);
}

/** Number of steps between two squares along their shared line. */
export function distanceTo(from: Square, to: Square): number {
  return Math.max(Math.abs(to.col - from.col), Math.abs(to.row - from.row));
}

export function isValidMove(from: Square, to: Square): boolean {
  return directionTo(from, to) >= 0;
}
