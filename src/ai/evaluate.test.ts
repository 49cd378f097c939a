import { describe, it, expect } from "vitest";
import { INFTY, WINNING_VALUE, terminalScore } from "./evaluate.ts";
import { Board } from "../game/board.ts";
import { layoutFromRows } from "../game/initialPosition.ts";

describe("terminalScore", () => {
  it("keeps the win sentinel just under the largest score", () => {
    expect(INFTY).toBe(2147483647);
    expect(WINNING_VALUE).toBe(2147483627);
  });

  it("is null while play continues", () => {
    expect(terminalScore(new Board())).toBe(null);
  });

  it("signs a win by the winner", () => {
    const rows = ["--------", "--------", "--------", "---ww---", "--------", "--------", "b------b", "--------"];
    expect(terminalScore(new Board(layoutFromRows(rows), "B"))).toBe(WINNING_VALUE);

    const blackRows = ["--------", "--------", "--------", "---bb---", "--------", "--------", "w------w", "--------"];
    expect(terminalScore(new Board(layoutFromRows(blackRows), "W"))).toBe(-WINNING_VALUE);
  });

  it("scores a tie as zero", () => {
    expect(terminalScore(new Board(layoutFromRows(Array<string>(8).fill("--------")), "B"))).toBe(0);
  });
});
