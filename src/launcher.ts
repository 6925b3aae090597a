// CHANGE: Orchestrate probe, collection, dispatch, engine run and cleanup.
// WHY: Stages run strictly in sequence; a failed probe leaves nothing behind.
// SOURCE: internal reasoning

import fs from "fs-extra";
import { ARTIFACTS, ENGINE, INTERPRETER } from "./config.js";
import { collectArguments, TransferLocation, transferFilePath } from "./collector.js";
import { inspectArtifacts, selectMode, toDirective } from "./dispatcher.js";
import { engineArguments, invokeEngine } from "./engine.js";
import { buildEngineEnvironment } from "./environment.js";
import { probeEnvironment } from "./interpreter.js";
import { debug, info } from "./logger.js";
import { EngineSettings, LaunchOutcome, ProcessRunner, VersionRequirement } from "./types.js";
import { nodeProcessRunner } from "./utils/process.js";

/**
 * Everything a launcher run reads from its surroundings.
 */
export interface LauncherDependencies {
  readonly runner: ProcessRunner;
  readonly baseEnv: NodeJS.ProcessEnv;
  readonly candidates: readonly string[];
  readonly minimum: VersionRequirement;
  readonly engine: EngineSettings;
  readonly transfer: TransferLocation;
  readonly sessionLog: string;
}

export interface LaunchOptions {
  readonly dryRun?: boolean;
}

/**
 * Dependencies backed by configuration and real child processes.
 *
 * @param overrides - Values replacing the configured ones.
 */
export function defaultDependencies(overrides: Partial<LauncherDependencies> = {}): LauncherDependencies {
  return {
    runner: nodeProcessRunner,
    baseEnv: process.env,
    candidates: INTERPRETER.CANDIDATES,
    minimum: INTERPRETER.MINIMUM,
    engine: {
      script: ENGINE.SCRIPT,
      workingDir: ENGINE.WORKING_DIR,
      libraryDir: ENGINE.LIBRARY_DIR,
      extraSearchDir: ENGINE.EXTRA_SEARCH_DIR
    },
    transfer: {
      fixedPath: ARTIFACTS.TRANSFER_FILE,
      directory: ARTIFACTS.TRANSFER_DIR,
      prefix: ARTIFACTS.TRANSFER_PREFIX
    },
    sessionLog: ARTIFACTS.SESSION_LOG,
    ...overrides
  };
}

/**
 * Run the launcher for the given dropped paths.
 *
 * Rename runs always remove the transfer file afterwards, whether the
 * engine succeeded, failed or could not be started.
 *
 * @throws LauncherError for environment and usage failures.
 * @returns Mode taken and the engine's exit status (0 on a dry run).
 */
export async function runLauncher(
  paths: readonly string[],
  deps: LauncherDependencies,
  options: LaunchOptions = {}
): Promise<LaunchOutcome> {
  const env = buildEngineEnvironment(deps.baseEnv, deps.engine);
  const { interpreter, version } = await probeEnvironment({
    candidates: deps.candidates,
    minimum: deps.minimum,
    runner: deps.runner,
    env
  });
  debug(`Using ${interpreter.resolvedPath} (${version.raw})`);

  const transferFile = transferFilePath(deps.transfer);
  await collectArguments(paths, transferFile);

  const state = await inspectArtifacts(transferFile, deps.sessionLog);
  const mode = selectMode(state);
  if (mode === "rename" && paths.length === 0) {
    info(`Transfer file ${transferFile} was left by an earlier run; renaming its paths.`);
  }
  const directive = toDirective(mode, transferFile);
  const dryRun = options.dryRun ?? false;

  try {
    if (dryRun) {
      info(`Dry-run: would run ${interpreter.command} ${engineArguments(directive, deps.engine.script).join(" ")}`);
      return { mode: directive.kind, exitCode: 0, dryRun };
    }
    info(`Launching engine in ${directive.kind} mode.`);
    const exitCode = await invokeEngine(interpreter, directive, deps.engine, deps.runner, env);
    debug(`Engine exited with status ${exitCode}`);
    return { mode: directive.kind, exitCode, dryRun };
  } finally {
    if (directive.kind === "rename") {
      await fs.remove(directive.transferFile);
      debug(`Removed transfer file ${directive.transferFile}`);
    }
  }
}
