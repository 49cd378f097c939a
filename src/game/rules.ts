export interface Rules {
  /** Moves per side before the game is declared a tie. */
  moveLimitPerSide: number;
  /** Plies searched by the machine player. */
  searchDepth: number;
}

export const RULES: Readonly<Rules> = Object.freeze({
  moveLimitPerSide: 60,
  searchDepth: 5,
});

export const DEFAULT_MOVE_LIMIT_PER_SIDE = RULES.moveLimitPerSide;
export const DEFAULT_SEARCH_DEPTH = RULES.searchDepth;
