#!/usr/bin/env node
// CHANGE: Delegate execution to the CLI runner.
// WHY: Allows importing CLI helpers without triggering immediate argument parsing.
// SOURCE: internal reasoning

import fs from "fs-extra";
import { pathToFileURL } from "url";
import { runCli } from "./cli.js";

export function entryPath(argvPath: string): string {
  try {
    return fs.realpathSync(argvPath);
  } catch {
    return argvPath;
  }
}

const executedDirectly = process.argv[1]
  ? pathToFileURL(entryPath(process.argv[1])).href === import.meta.url
  : false;

if (executedDirectly) {
  void runCli(process.argv);
}

export { runCli };
export { runLauncher, defaultDependencies } from "./launcher.js";
export { formatAlert } from "./alert.js";
export { LauncherError } from "./errors.js";
export type { LauncherDependencies } from "./launcher.js";
export type { LaunchOutcome, ProcessRunner } from "./types.js";
