// CHANGE: Centralise launcher configuration with environment overrides.
// WHY: Interpreter candidates, engine location and artifact paths are fixed per installation.
// SOURCE: internal reasoning

import * as dotenv from "dotenv";
import os from "os";
import path from "path";

dotenv.config();

const engineName = process.env.LAUNCHER_ENGINE_NAME ?? "renamer";
const pinnedInterpreter = process.env.LAUNCHER_PYTHON;

/**
 * Interpreter discovery and version gate settings.
 *
 * Invariant: `CANDIDATES` is ordered, the versioned name first.
 */
export const INTERPRETER = {
  CANDIDATES: pinnedInterpreter ? [pinnedInterpreter] : ["python3", "python"],
  MINIMUM: { major: 3, minor: 6 },
  DISPLAY_NAME: "Python"
} as const;

/**
 * Engine invocation settings.
 */
export const ENGINE = {
  NAME: engineName,
  SCRIPT: process.env.LAUNCHER_ENGINE_SCRIPT ?? `${engineName}.py`,
  WORKING_DIR: process.env.LAUNCHER_ENGINE_DIR ?? process.cwd(),
  LIBRARY_DIR: process.env.LAUNCHER_ENGINE_LIB ?? "lib",
  EXTRA_SEARCH_DIR: process.env.LAUNCHER_EXTRA_PATH ?? "/usr/local/bin"
} as const;

/**
 * Artifact locations shared with the engine.
 *
 * `TRANSFER_FILE` pins a fixed path; when empty a fresh file is used per run.
 */
export const ARTIFACTS = {
  TRANSFER_FILE: process.env.LAUNCHER_TRANSFER_FILE ?? "",
  TRANSFER_DIR: os.tmpdir(),
  TRANSFER_PREFIX: `${engineName}_paths`,
  SESSION_LOG: process.env.LAUNCHER_SESSION_LOG ?? path.join(os.homedir(), `.${engineName}`, "log.txt")
} as const;
