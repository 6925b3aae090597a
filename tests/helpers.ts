import fs from "fs-extra";
import os from "os";
import path from "path";
import { ProcessResult, ProcessRunner, ProcessRunOptions } from "../src/types.js";

export interface RecordedRun {
  readonly command: string;
  readonly args: readonly string[];
  readonly options: ProcessRunOptions;
}

/**
 * In-process stand-in for child processes: answers the version query and
 * records engine runs.
 */
export class FakeRunner implements ProcessRunner {
  readonly runs: RecordedRun[] = [];

  constructor(
    private readonly version: string,
    private readonly engineResult: (run: RecordedRun) => Promise<ProcessResult> = async () => ({ status: 0, stdout: "" })
  ) {}

  async run(command: string, args: readonly string[], options: ProcessRunOptions): Promise<ProcessResult> {
    const run = { command, args, options };
    this.runs.push(run);
    if (args[0] === "-c") {
      return { status: 0, stdout: `${this.version}\n` };
    }
    return this.engineResult(run);
  }

  engineRuns(): RecordedRun[] {
    return this.runs.filter(run => run.args[0] !== "-c");
  }
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "drop-rename-test-"));
}

export async function writeExecutable(directory: string, name: string): Promise<string> {
  const target = path.join(directory, name);
  await fs.outputFile(target, "#!/bin/sh\n");
  await fs.chmod(target, 0o755);
  return target;
}
