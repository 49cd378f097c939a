// Environment flags. Values come from process.env so the same switches work
// under Vitest and in a host process embedding the engine.

type ProcessEnv = Record<string, string | undefined>;

function getProcessEnv(): ProcessEnv | undefined {
  if (typeof process !== "undefined" && typeof process.env === "object") {
    return process.env;
  }
  return undefined;
}

export function readEnv(name: string, env: ProcessEnv | undefined = getProcessEnv()): string | undefined {
  const value = env?.[name];
  return typeof value === "string" ? value : undefined;
}

export function flagEnabled(name: string, env?: ProcessEnv): boolean {
  const raw = readEnv(name, env);
  if (!raw) return false;
  return raw === "1" || raw === "true" || raw === "TRUE";
}

/** LOA_SEARCH_LOG=1 prints one line per machine move (move, score, nodes, ms). */
export function isSearchLogEnabled(env?: ProcessEnv): boolean {
  return flagEnabled("LOA_SEARCH_LOG", env);
}
