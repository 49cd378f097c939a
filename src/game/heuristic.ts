import { totalPieces } from "./regions.ts";

/** floor(sqrt(2^31 - 1)) */
export const HEURISTIC_SCALE = 46340;

/** Largest magnitude a static estimate may take; stays far below a forced win. */
export const HEURISTIC_LIMIT = 2 ** 30;

function largestShare(sizes: readonly number[]): number {
  return sizes[0] / totalPieces(sizes);
}

function clamp(n: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, n));
}

/**
 * Static estimate from region sizes (largest first). Positive favours White.
 *
 * Fewer regions is better. The region-count difference is scaled by the
 * whole number of times the advantaged side's largest-group share exceeds the
 * other side's; below one, the estimate is 0.
 */
export function regionHeuristic(whiteSizes: readonly number[], blackSizes: readonly number[]): number {
  const whiteEmpty = whiteSizes.length === 0;
  const blackEmpty = blackSizes.length === 0;
  if (whiteEmpty && blackEmpty) return 0;
  if (whiteEmpty) return -HEURISTIC_LIMIT;
  if (blackEmpty) return HEURISTIC_LIMIT;

  const diff = blackSizes.length - whiteSizes.length;
  if (diff === 0) return 0;

  const whiteRatio = largestShare(whiteSizes);
  const blackRatio = largestShare(blackSizes);
  const scale = Math.trunc(diff > 0 ? whiteRatio / blackRatio : blackRatio / whiteRatio);
  if (scale === 0) return 0;
  return clamp(HEURISTIC_SCALE * diff * scale, -HEURISTIC_LIMIT, HEURISTIC_LIMIT);
}
