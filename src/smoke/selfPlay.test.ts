import { describe, it, expect } from "vitest";
import { Board } from "../game/board.ts";
import { chooseMove } from "../ai/search.ts";
import { formatMove } from "../game/moveTypes.ts";
import { hashBoard } from "../game/hashState.ts";
import { formatBoard } from "../game/boardFormat.ts";

describe("self-play smoke", () => {
  it("plays shallow searches from the opening and retracts back to the start", () => {
    const b = new Board();
    const start = hashBoard(b);
    const played: string[] = [];

    for (let ply = 0; ply < 10 && !b.gameOver(); ply++) {
      const move = chooseMove(b, { depth: 1, log: false });
      expect(b.isLegalMove(move), formatBoard(b)).toBe(true);
      b.makeMove(move);
      played.push(formatMove(move));

      // Side to move follows history parity from a black start.
      expect(b.turn()).toBe(b.movesMade() % 2 === 0 ? "B" : "W");
    }

    expect(played.length).toBeGreaterThan(0);
    expect(b.movesMade()).toBe(played.length);
    expect(b.moves().map(formatMove)).toEqual(played);

    while (b.movesMade() > 0) b.retract();
    expect(hashBoard(b)).toBe(start);
    expect(b.legalMoves().length).toBe(36);
  });
});
