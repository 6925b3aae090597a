// CHANGE: Spawn child processes and wait for their exit status.
// WHY: The version query needs captured stdout; the engine run inherits the terminal.
// SOURCE: internal reasoning

import { spawn } from "child_process";
import { debug } from "../logger.js";
import { ProcessResult, ProcessRunner, ProcessRunOptions } from "../types.js";

/**
 * Run a command to completion.
 *
 * Rejects when the process cannot be spawned; resolves with `status: null`
 * when it was terminated by a signal.
 */
export function runProcess(command: string, args: readonly string[], options: ProcessRunOptions): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    debug(`Spawning ${command} ${args.join(" ")}`);
    const child = spawn(command, [...args], {
      cwd: options.cwd,
      env: options.env,
      stdio: options.captureOutput ? ["ignore", "pipe", "inherit"] : "inherit"
    });

    let stdout = "";
    child.stdout?.on("data", (data: Buffer) => {
      stdout += data.toString();
    });

    child.on("error", reject);
    child.on("close", (code, signal) => {
      if (signal) {
        debug(`${command} terminated by ${signal}`);
      }
      resolve({ status: code, stdout });
    });
  });
}

export const nodeProcessRunner: ProcessRunner = {
  run: runProcess
};
