import type { Move } from "../game/moveTypes.ts";

/** +1 when the node's side wants the maximum (White), -1 for the minimum (Black). */
export type Sense = 1 | -1;

export interface SearchOptions {
  /** Plies to search; defaults to the fixed engine depth. */
  depth?: number;
  /** Overrides the LOA_SEARCH_LOG flag for this call. */
  log?: boolean;
}

export interface SearchStats {
  nodes: number;
}

export interface NodeResult {
  score: number;
  /** Set only by the root call. */
  move: Move | null;
}

export interface SearchResult {
  move: Move;
  score: number;
  depth: number;
  nodes: number;
  ms: number;
}
