// CHANGE: Expose the launcher through a commander program.
// WHY: The desktop wrapper passes dropped paths as plain positional arguments.
// SOURCE: internal reasoning

import { Command, CommanderError } from "commander";
import { emitAlert } from "./alert.js";
import { isLauncherError } from "./errors.js";
import { LauncherDependencies, defaultDependencies, runLauncher } from "./launcher.js";
import { error as logError, setLogLevel } from "./logger.js";

export interface LaunchCommandOptions {
  readonly dryRun?: boolean;
  readonly interpreter?: string;
  readonly logLevel?: string;
}

/**
 * Launch mode entry point: run the launcher and translate its outcome into
 * an exit status. Launcher errors become alert lines.
 *
 * @returns Exit status for the process.
 */
export async function launchAction(
  paths: readonly string[],
  options: LaunchCommandOptions,
  deps: LauncherDependencies
): Promise<number> {
  if (options.logLevel) {
    setLogLevel(options.logLevel);
  }
  const effective = options.interpreter ? { ...deps, candidates: [options.interpreter] } : deps;
  try {
    const outcome = await runLauncher(paths, effective, { dryRun: options.dryRun });
    return outcome.exitCode;
  } catch (failure) {
    if (isLauncherError(failure)) {
      emitAlert(failure);
      return failure.exitCode;
    }
    throw failure;
  }
}

/**
 * Construct commander program wired to the launcher.
 *
 * @param deps - Launcher dependencies; configuration-backed by default.
 * @returns Ready-to-use commander instance.
 */
export function buildProgram(deps: LauncherDependencies = defaultDependencies()): Command {
  const program = new Command();
  program
    .name("drop-rename")
    .description("Forward dropped files to the batch renamer, or undo its previous session")
    .version("1.0.0", "--version")
    .helpOption("--help", "Display help")
    .argument("[paths...]", "Files to rename, one per argument; options are only read before the first path")
    .option("--dry-run", "Probe and choose the mode without starting the engine")
    .option("--interpreter <name>", "Interpreter to use instead of the configured candidates")
    .option("--log-level <level>", "Log level: debug, info or error")
    .allowUnknownOption()
    .passThroughOptions()
    .exitOverride()
    .action(async (paths: string[], options: LaunchCommandOptions) => {
      process.exitCode = await launchAction(paths, options, deps);
    });
  return program;
}

/**
 * Execute CLI with provided argv array.
 *
 * @param argv - Process arguments.
 */
export async function runCli(argv: readonly string[], deps?: LauncherDependencies): Promise<void> {
  const program = buildProgram(deps);
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str.trimEnd())
      })
      .parseAsync([...argv]);
  } catch (error) {
    if (error instanceof CommanderError) {
      process.exitCode = error.exitCode;
      return;
    }
    logError(`CLI failed: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  }
}
