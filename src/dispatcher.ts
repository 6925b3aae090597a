// CHANGE: Three-way mode decision between rename, undo and usage.
// WHY: A present transfer file always wins over a present session log.
// SOURCE: internal reasoning

import fs from "fs-extra";
import { usageError } from "./errors.js";
import { ArtifactState, EngineDirective, LaunchMode } from "./types.js";

export const USAGE_MESSAGE =
  "Drag and drop onto the launcher icon the files you want to rename. " +
  "Launching it without files only undoes the previous renaming session (if any).";

export function selectMode(state: ArtifactState): LaunchMode {
  if (state.transferFileExists) {
    return "rename";
  }
  return state.sessionLogExists ? "undo" : "usage";
}

/**
 * Snapshot artifact existence. The session log is never opened.
 */
export async function inspectArtifacts(transferFile: string, sessionLog: string): Promise<ArtifactState> {
  const [transferFileExists, sessionLogExists] = await Promise.all([
    fs.pathExists(transferFile),
    fs.pathExists(sessionLog)
  ]);
  return { transferFileExists, sessionLogExists };
}

/**
 * Map the selected mode to the directive forwarded to the engine.
 *
 * @throws LauncherError (UsageError) for the usage mode.
 */
export function toDirective(mode: LaunchMode, transferFile: string): EngineDirective {
  switch (mode) {
    case "rename":
      return { kind: "rename", transferFile };
    case "undo":
      return { kind: "undo" };
    case "usage":
      throw usageError(USAGE_MESSAGE);
  }
}
