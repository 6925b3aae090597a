// CHANGE: Verify entry-point path resolution.
// WHY: Importing the entry point must not throw for an argv path that does not exist.
// SOURCE: internal reasoning

import fs from "fs-extra";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { entryPath } from "../src/index.js";
import { makeTempDir } from "./helpers.js";

describe("entryPath", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it("falls back to the given path when it does not exist", () => {
    const missing = path.join(dir, "missing.js");
    expect(entryPath(missing)).toBe(missing);
  });

  it("resolves a bin symlink to its target", async () => {
    const target = path.join(dir, "index.js");
    const link = path.join(dir, "drop-rename");
    await fs.outputFile(target, "");
    await fs.symlink(target, link);
    expect(entryPath(link)).toBe(fs.realpathSync(target));
  });
});
