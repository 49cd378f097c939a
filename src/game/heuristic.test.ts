import { describe, it, expect } from "vitest";
import { HEURISTIC_LIMIT, HEURISTIC_SCALE, regionHeuristic } from "./heuristic.ts";
import { WINNING_VALUE } from "../ai/evaluate.ts";

describe("regionHeuristic", () => {
  it("is zero when both sides have the same number of groups", () => {
    expect(regionHeuristic([6, 6], [6, 6])).toBe(0);
    expect(regionHeuristic([10, 2], [7, 5])).toBe(0);
  });

  it("favours the side with fewer groups", () => {
    // White: one group of 4 (share 1). Black: two of 2 (share 0.5).
    expect(regionHeuristic([4], [2, 2])).toBe(HEURISTIC_SCALE * 2);
    expect(regionHeuristic([2, 2], [4])).toBe(-HEURISTIC_SCALE * 2);
  });

  it("scales the group difference by the whole part of the share ratio", () => {
    // diff = 3 - 2 = 1; white share 0.75, black share 0.5, ratio 1.5 -> 1.
    expect(regionHeuristic([3, 1], [2, 1, 1])).toBe(HEURISTIC_SCALE);
    expect(regionHeuristic([2, 1, 1], [3, 1])).toBe(-HEURISTIC_SCALE);
  });

  it("is zero when the side with fewer groups has the looser largest group", () => {
    // diff = 1; white share 0.5, black share 4/6, ratio 0.75 -> 0.
    expect(regionHeuristic([2, 2], [4, 1, 1])).toBe(0);
    expect(regionHeuristic([4, 1, 1], [2, 2])).toBe(0);
  });

  it("gives the full bound to the side facing an empty opponent", () => {
    expect(regionHeuristic([3], [])).toBe(HEURISTIC_LIMIT);
    expect(regionHeuristic([], [3])).toBe(-HEURISTIC_LIMIT);
    expect(regionHeuristic([], [])).toBe(0);
  });

  it("stays below a forced win", () => {
    expect(HEURISTIC_LIMIT).toBeLessThan(WINNING_VALUE);
    expect(Math.abs(regionHeuristic([12], Array<number>(12).fill(1)))).toBeLessThan(WINNING_VALUE);
  });
});
