// CHANGE: Derive the interpreter and engine environment from the parent one.
// WHY: PATH and PYTHONPATH overrides stay local to the child processes.
// SOURCE: internal reasoning

import path from "path";
import { EngineSettings } from "./types.js";

const SEARCH_PATH_VARIABLE = "PATH";
const ENGINE_IMPORT_VARIABLE = "PYTHONPATH";

/**
 * Derive the process-local environment used for interpreter resolution and
 * the engine run. `base` is copied, never mutated.
 *
 * @returns New environment with the extra search directory prepended and
 * the engine library directory exported.
 */
export function buildEngineEnvironment(
  base: NodeJS.ProcessEnv,
  settings: Pick<EngineSettings, "extraSearchDir" | "libraryDir">
): NodeJS.ProcessEnv {
  const inherited = base[SEARCH_PATH_VARIABLE];
  const searchPath = inherited ? `${settings.extraSearchDir}${path.delimiter}${inherited}` : settings.extraSearchDir;
  return {
    ...base,
    [SEARCH_PATH_VARIABLE]: searchPath,
    [ENGINE_IMPORT_VARIABLE]: settings.libraryDir
  };
}

/**
 * Split a search-path value into its directories, dropping empty segments.
 */
export function searchDirectories(env: NodeJS.ProcessEnv): string[] {
  return (env[SEARCH_PATH_VARIABLE] ?? "").split(path.delimiter).filter(dir => dir.length > 0);
}
