// CHANGE: Accumulate dropped paths into the transfer file read by the engine.
// WHY: The engine takes a newline-delimited list through `--file`.
// SOURCE: internal reasoning

import { randomUUID } from "crypto";
import fs from "fs-extra";
import path from "path";
import { debug } from "./logger.js";

export interface TransferLocation {
  readonly fixedPath: string;
  readonly directory: string;
  readonly prefix: string;
}

/**
 * Choose the transfer file for this run: the pinned path when one is
 * configured, otherwise a fresh name under the temp directory.
 */
export function transferFilePath(location: TransferLocation): string {
  if (location.fixedPath) {
    return location.fixedPath;
  }
  return path.join(location.directory, `${location.prefix}-${randomUUID()}.txt`);
}

/**
 * Append each path as its own line, in order.
 *
 * Paths are not validated. Existing content is kept; an empty list leaves
 * the file untouched (and uncreated).
 */
export async function collectArguments(paths: readonly string[], transferFile: string): Promise<void> {
  if (paths.length === 0) {
    debug("No paths collected.");
    return;
  }
  const payload = paths.map(entry => `${entry}\n`).join("");
  await fs.appendFile(transferFile, payload, "utf8");
  debug(`Collected ${paths.length} path(s) into ${transferFile}`);
}
