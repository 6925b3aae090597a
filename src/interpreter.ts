// CHANGE: Locate a usable interpreter and gate it on a minimum version.
// WHY: The probe must fail before any artifact is written or the engine is started.
// SOURCE: internal reasoning

import fs from "fs-extra";
import path from "path";
import { INTERPRETER } from "./config.js";
import { environmentError } from "./errors.js";
import { searchDirectories } from "./environment.js";
import { debug } from "./logger.js";
import {
  InterpreterReference,
  InterpreterVersion,
  ProbeResult,
  ProcessResult,
  ProcessRunner,
  VersionRequirement
} from "./types.js";

const VERSION_PROGRAM = "import sys; print('{0[0]}.{0[1]}.{0[2]}'.format(sys.version_info))";
const VERSION_PATTERN = /^(\d+)\.(\d+)(?:\.\S+)?$/;

async function isExecutableFile(candidate: string): Promise<boolean> {
  try {
    const stats = await fs.stat(candidate);
    if (!stats.isFile()) {
      return false;
    }
    await fs.access(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve the first candidate found on the search path.
 *
 * Candidates are tried in order; each one is looked up through every
 * directory before falling back to the next name.
 *
 * @returns Interpreter reference, or undefined when nothing resolves.
 */
export async function resolveInterpreter(
  candidates: readonly string[],
  env: NodeJS.ProcessEnv
): Promise<InterpreterReference | undefined> {
  const directories = searchDirectories(env);
  for (const command of candidates) {
    if (path.isAbsolute(command)) {
      if (await isExecutableFile(command)) {
        return { command, resolvedPath: command };
      }
      continue;
    }
    for (const directory of directories) {
      const resolvedPath = path.join(directory, command);
      if (await isExecutableFile(resolvedPath)) {
        debug(`Resolved interpreter ${command} at ${resolvedPath}`);
        return { command, resolvedPath };
      }
    }
    debug(`Interpreter candidate ${command} not found on search path`);
  }
  return undefined;
}

/**
 * Parse `major.minor[.micro]` output.
 *
 * @returns Parsed version, or undefined for anything else.
 */
export function parseInterpreterVersion(output: string): InterpreterVersion | undefined {
  const raw = output.trim();
  const match = VERSION_PATTERN.exec(raw);
  if (!match) {
    return undefined;
  }
  return {
    major: Number.parseInt(match[1], 10),
    minor: Number.parseInt(match[2], 10),
    raw
  };
}

/**
 * Encode major/minor as four digits (3.6 -> "0306"). Diagnostic only:
 * gating uses {@link meetsMinimumVersion}.
 */
export function formatVersionToken(version: VersionRequirement): string {
  const pad = (value: number): string => String(value).padStart(2, "0");
  return `${pad(version.major)}${pad(version.minor)}`;
}

export function meetsMinimumVersion(version: VersionRequirement, minimum: VersionRequirement): boolean {
  if (version.major !== minimum.major) {
    return version.major > minimum.major;
  }
  return version.minor >= minimum.minor;
}

function requirementText(minimum: VersionRequirement): string {
  return `${INTERPRETER.DISPLAY_NAME} ${minimum.major}.${minimum.minor} or higher is required`;
}

/**
 * Ask the interpreter for its version.
 *
 * @returns Parsed version, or undefined when the query cannot start, exits
 * non-zero or prints something unexpected.
 */
export async function queryInterpreterVersion(
  interpreter: InterpreterReference,
  runner: ProcessRunner,
  env: NodeJS.ProcessEnv
): Promise<InterpreterVersion | undefined> {
  let result: ProcessResult;
  try {
    result = await runner.run(interpreter.resolvedPath, ["-c", VERSION_PROGRAM], { env, captureOutput: true });
  } catch (error) {
    debug(`Version query for ${interpreter.command} could not start: ${error instanceof Error ? error.message : String(error)}`);
    return undefined;
  }
  if (result.status !== 0) {
    debug(`Version query for ${interpreter.command} exited with ${result.status ?? "signal"}`);
    return undefined;
  }
  return parseInterpreterVersion(result.stdout);
}

export interface ProbeOptions {
  readonly candidates: readonly string[];
  readonly minimum: VersionRequirement;
  readonly runner: ProcessRunner;
  readonly env: NodeJS.ProcessEnv;
}

/**
 * Resolve the interpreter, query its version and apply the gate.
 *
 * @throws LauncherError (EnvironmentError) when no interpreter resolves or
 * the resolved one is too old.
 */
export async function probeEnvironment(options: ProbeOptions): Promise<ProbeResult> {
  const interpreter = await resolveInterpreter(options.candidates, options.env);
  if (!interpreter) {
    throw environmentError(`${requirementText(options.minimum)}, but no interpreter was found on PATH.`);
  }
  const version = await queryInterpreterVersion(interpreter, options.runner, options.env);
  if (!version) {
    throw environmentError(`${requirementText(options.minimum)}, but ${interpreter.command} did not report its version.`);
  }
  debug(`Interpreter ${interpreter.command} reports ${version.raw} (token ${formatVersionToken(version)})`);
  if (!meetsMinimumVersion(version, options.minimum)) {
    throw environmentError(`${requirementText(options.minimum)}. Yours is ${version.raw}.`);
  }
  return { interpreter, version };
}
