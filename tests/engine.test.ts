// CHANGE: Verify engine arguments and exit status handling.
// WHY: Rename passes the transfer file; undo passes only its flag.
// SOURCE: internal reasoning

import { describe, expect, it } from "vitest";
import { engineArguments, invokeEngine, SIGNAL_EXIT_CODE } from "../src/engine.js";
import { FakeRunner } from "./helpers.js";

const interpreter = { command: "python3", resolvedPath: "/usr/bin/python3" };
const settings = { script: "renamer.py", workingDir: "/opt/renamer" };

describe("engineArguments", () => {
  it("passes the transfer file in rename mode", () => {
    expect(engineArguments({ kind: "rename", transferFile: "/tmp/p.txt" }, "renamer.py")).toEqual([
      "renamer.py",
      "--file",
      "/tmp/p.txt"
    ]);
  });

  it("passes only the undo flag in undo mode", () => {
    expect(engineArguments({ kind: "undo" }, "renamer.py")).toEqual(["renamer.py", "--undo"]);
  });
});

describe("invokeEngine", () => {
  it("runs the engine with inherited output and returns its status", async () => {
    const runner = new FakeRunner("3.9.1", async () => ({ status: 4, stdout: "" }));
    const env = { PATH: "/usr/bin", PYTHONPATH: "lib" };
    const status = await invokeEngine(interpreter, { kind: "undo" }, settings, runner, env);
    expect(status).toBe(4);
    expect(runner.runs).toEqual([
      {
        command: "/usr/bin/python3",
        args: ["renamer.py", "--undo"],
        options: { env, cwd: "/opt/renamer", captureOutput: false }
      }
    ]);
  });

  it("maps signal termination to a failure status", async () => {
    const runner = new FakeRunner("3.9.1", async () => ({ status: null, stdout: "" }));
    const status = await invokeEngine(interpreter, { kind: "undo" }, settings, runner, {});
    expect(status).toBe(SIGNAL_EXIT_CODE);
  });
});
