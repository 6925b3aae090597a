// CHANGE: Start the engine with one of its two directives.
// WHY: The engine reports its own failures; only its exit status comes back.
// SOURCE: internal reasoning

import path from "path";
import { debug } from "./logger.js";
import { EngineDirective, EngineSettings, InterpreterReference, ProcessRunner } from "./types.js";

/**
 * Exit status reported when the engine was terminated by a signal.
 */
export const SIGNAL_EXIT_CODE = 1;

/**
 * Engine command-line arguments for a directive.
 */
export function engineArguments(directive: EngineDirective, script: string): string[] {
  switch (directive.kind) {
    case "rename":
      return [script, "--file", directive.transferFile];
    case "undo":
      return [script, "--undo"];
  }
}

/**
 * Run the engine and wait for it to exit.
 *
 * The engine reports its own failures; its status is returned untouched.
 *
 * @returns Engine exit status.
 */
export async function invokeEngine(
  interpreter: InterpreterReference,
  directive: EngineDirective,
  settings: Pick<EngineSettings, "script" | "workingDir">,
  runner: ProcessRunner,
  env: NodeJS.ProcessEnv
): Promise<number> {
  const args = engineArguments(directive, settings.script);
  debug(`Invoking engine in ${directive.kind} mode from ${path.resolve(settings.workingDir)}`);
  const result = await runner.run(interpreter.resolvedPath, args, {
    env,
    cwd: settings.workingDir,
    captureOutput: false
  });
  return result.status ?? SIGNAL_EXIT_CODE;
}
