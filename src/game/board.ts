import type { Piece, Player } from "../types.ts";
import { opposite, oppositePiece } from "../types.ts";
import type { Square } from "./coords.ts";
import { ALL_SQUARES, BOARD_SIZE, DIR_DELTAS, directionTo, distanceTo, inBounds, isValidMove, moveDest, sq } from "./coords.ts";
import type { Move } from "./moveTypes.ts";
import { captureMove, formatMove, mv } from "./moveTypes.ts";
import type { Layout } from "./initialPosition.ts";
import { INITIAL_PIECES, assertLayoutShape } from "./initialPosition.ts";
import type { RegionSizes } from "./regions.ts";
import { computeRegionSizes, isContiguous, totalPieces } from "./regions.ts";
import { regionHeuristic } from "./heuristic.ts";
import { DEFAULT_MOVE_LIMIT_PER_SIDE } from "./rules.ts";
import { ConfigurationError, PreconditionError } from "./errors.ts";

/**
 * Lines of Action position: placement, side to move and the stack of moves
 * made so far. Mutated only by makeMove / retract / set; every mutator
 * drops the cached winner and region sizes.
 */
export class Board {
  private readonly cells: Piece[] = new Array<Piece>(BOARD_SIZE * BOARD_SIZE).fill("E");
  private readonly history: Move[] = [];
  private side: Player = "B";
  private limit = 2 * DEFAULT_MOVE_LIMIT_PER_SIDE;

  private winnerKnown = false;
  private cachedWinner: Piece | null = null;

  private regionsValid = false;
  private regions: RegionSizes = { W: [], B: [] };

  /** Standard opening with Black to move unless a layout is given. */
  constructor(layout: Layout = INITIAL_PIECES, turn: Player = "B") {
    this.initialize(layout, turn);
  }

  static copyOf(board: Board): Board {
    const copy = new Board();
    copy.copyFrom(board);
    return copy;
  }

  initialize(layout: Layout, turn: Player): void {
    assertLayoutShape(layout);
    for (let row = 0; row < BOARD_SIZE; row++) {
      for (let col = 0; col < BOARD_SIZE; col++) {
        this.cells[sq(col, row).index] = layout[row][col];
      }
    }
    this.side = turn;
    this.limit = 2 * DEFAULT_MOVE_LIMIT_PER_SIDE;
    this.history.length = 0;
    this.invalidate();
  }

  clear(): void {
    this.initialize(INITIAL_PIECES, "B");
  }

  copyFrom(board: Board): void {
    if (board === this) return;
    for (let i = 0; i < this.cells.length; i++) this.cells[i] = board.cells[i];
    this.history.length = 0;
    this.history.push(...board.history);
    this.side = board.side;
    this.limit = board.limit;
    this.invalidate();
  }

  get(square: Square): Piece {
    return this.cells[this.checkSquare(square, "get")];
  }

  /** Writes a cell directly; `next`, when given, becomes the side to move. */
  set(square: Square, piece: Piece, next?: Player | null): void {
    this.cells[this.checkSquare(square, "set")] = piece;
    if (next) this.side = next;
    this.invalidate();
  }

  turn(): Player {
    return this.side;
  }

  movesMade(): number {
    return this.history.length;
  }

  moves(): readonly Move[] {
    return this.history;
  }

  lastMove(): Move | null {
    return this.history.length > 0 ? this.history[this.history.length - 1] : null;
  }

  /** Total moves (both sides) after which the game is a tie. */
  moveLimit(): number {
    return this.limit;
  }

  /** Sets the per-side move limit. Rejected if the game has already reached it. */
  setMoveLimit(perSide: number): void {
    if (!Number.isInteger(perSide) || 2 * perSide <= this.movesMade()) {
      throw new ConfigurationError("CONFIG_MOVE_LIMIT", `setMoveLimit: ${perSide} moves per side is too small`, {
        perSide,
        movesMade: this.movesMade(),
      });
    }
    this.limit = 2 * perSide;
    this.winnerKnown = false;
  }

  /** Pieces anywhere on the full line through `square` along `dir`, `square` included. */
  countPieces(square: Square, dir: number): number {
    let n = 1;
    for (const d of [dir, (dir + 4) % DIR_DELTAS.length]) {
      for (let s = moveDest(square, d, 1); s !== null; s = moveDest(s, d, 1)) {
        if (this.cells[s.index] !== "E") n++;
      }
    }
    return n;
  }

  isLegal(from: Square, to: Square): boolean {
    if (this.cells[from.index] !== this.side || !isValidMove(from, to) || this.blocked(from, to)) return false;
    return this.countPieces(from, directionTo(from, to)) === distanceTo(from, to);
  }

  /** The capture flag is ignored. */
  isLegalMove(move: Move): boolean {
    return this.isLegal(move.from, move.to);
  }

  /** Square order, then direction order, then increasing distance. */
  legalMoves(): Move[] {
    const out: Move[] = [];
    for (const from of ALL_SQUARES) {
      if (this.cells[from.index] !== this.side) continue;
      for (let dir = 0; dir < DIR_DELTAS.length; dir++) {
        for (let to = moveDest(from, dir, 1); to !== null; to = moveDest(to, dir, 1)) {
          if (this.isLegal(from, to)) out.push(mv(from, to));
        }
      }
    }
    return out;
  }

  makeMove(move: Move): void {
    if (!this.isLegalMove(move)) {
      throw new PreconditionError("PRECONDITION_ILLEGAL_MOVE", `makeMove: illegal move ${formatMove(move)}`, {
        move: formatMove(move),
        turn: this.side,
      });
    }
    const enemy = opposite(this.side);
    const stored = this.cells[move.to.index] === enemy ? captureMove(move) : mv(move.from, move.to);
    this.cells[stored.to.index] = this.cells[stored.from.index];
    this.cells[stored.from.index] = "E";
    this.side = enemy;
    this.history.push(stored);
    this.invalidate();
  }

  retract(): void {
    const last = this.history.pop();
    if (last === undefined) {
      throw new PreconditionError("PRECONDITION_EMPTY_HISTORY", "retract: no moves to retract");
    }
    const moved = this.cells[last.to.index];
    this.cells[last.from.index] = moved;
    this.cells[last.to.index] = last.capture ? oppositePiece(moved) : "E";
    this.side = opposite(this.side);
    this.invalidate();
  }

  /**
   * Makes `move`, runs `body`, and retracts the move on every way out of
   * `body`. The body must leave the history as it found it.
   */
  withMove<T>(move: Move, body: () => T): T {
    this.makeMove(move);
    const depth = this.history.length;
    let result: T;
    try {
      result = body();
    } catch (err) {
      this.checkBalanced(depth, err);
      this.retract();
      throw err;
    }
    this.checkBalanced(depth);
    this.retract();
    return result;
  }

  /** Takes back the last two moves (one per side). Returns false when nothing was undone. */
  undo(): boolean {
    if (this.movesMade() > 1 && !this.gameOver()) {
      this.retract();
      this.retract();
      return true;
    }
    return false;
  }

  gameOver(): boolean {
    return this.winner() !== null;
  }

  /** Winning side, "E" for a tie, or null while play continues. */
  winner(): Piece | null {
    if (!this.winnerKnown) {
      const result = this.resolveWinner();
      if (result === null) return null;
      this.cachedWinner = result;
      this.winnerKnown = true;
    }
    return this.cachedWinner;
  }

  piecesContiguous(side: Player): boolean {
    return isContiguous(this.getRegionSizes(side));
  }

  /** Region sizes for `side`, largest first. */
  getRegionSizes(side: Player): readonly number[] {
    if (!this.regionsValid) {
      this.regions = computeRegionSizes(this.cells);
      this.regionsValid = true;
    }
    return this.regions[side];
  }

  numPieces(side: Player): number {
    return totalPieces(this.getRegionSizes(side));
  }

  /** Static estimate; positive favours White. */
  heuristicEstimate(): number {
    return regionHeuristic(this.getRegionSizes("W"), this.getRegionSizes("B"));
  }

  equals(other: Board): boolean {
    if (this.side !== other.side) return false;
    for (let i = 0; i < this.cells.length; i++) {
      if (this.cells[i] !== other.cells[i]) return false;
    }
    return true;
  }

  private resolveWinner(): Piece | null {
    const mover = this.side;
    const other = opposite(mover);
    // The side that just moved (not on turn) is credited first.
    if (this.piecesContiguous(other)) return other;
    if (this.piecesContiguous(mover)) return mover;

    const moverPieces = this.numPieces(mover);
    const otherPieces = this.numPieces(other);
    if (moverPieces === 0 && otherPieces === 0) return "E";
    if (otherPieces === 0) return mover;
    if (moverPieces === 0) return other;

    if (this.movesMade() >= this.limit) return "E";
    return null;
  }

  /** True if an enemy piece sits strictly between the squares, or a friendly one on `to`. */
  private blocked(from: Square, to: Square): boolean {
    if (this.cells[to.index] === this.side) return true;
    const enemy = opposite(this.side);
    const dir = directionTo(from, to);
    for (let s = moveDest(from, dir, 1); s !== null && s !== to; s = moveDest(s, dir, 1)) {
      if (this.cells[s.index] === enemy) return true;
    }
    return false;
  }

  /** `cause` is the error the body threw, if any. */
  private checkBalanced(depth: number, cause?: unknown): void {
    if (this.history.length === depth) return;
    throw new PreconditionError("PRECONDITION_UNBALANCED_HISTORY", "withMove: body changed the move history", {
      expected: depth,
      actual: this.history.length,
      ...(cause === undefined ? {} : { cause }),
    });
  }

  private checkSquare(square: Square, fn: string): number {
    if (!inBounds(square.col, square.row) || square.index !== square.col + BOARD_SIZE * square.row) {
      throw new PreconditionError("PRECONDITION_BAD_SQUARE", `${fn}: square is off the board`, {
        col: square.col,
        row: square.row,
      });
    }
    return square.index;
  }

  private invalidate(): void {
    this.winnerKnown = false;
    this.cachedWinner = null;
    this.regionsValid = false;
  }
}
