// CHANGE: Verify logger respects configured log level.
// WHY: Stage tracing must stay silent unless debug output was requested.
// SOURCE: internal reasoning

import { afterEach, describe, expect, it, vi } from "vitest";
import { debug, error, info, isLogLevel, setLogLevel } from "../src/logger.js";

describe("logger", () => {
  afterEach(() => {
    setLogLevel("info");
    vi.restoreAllMocks();
  });

  it("suppresses debug logs when level is info", () => {
    setLogLevel("info");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    debug("hidden");
    expect(logSpy).not.toHaveBeenCalled();
  });

  it("emits debug logs when level is debug", () => {
    setLogLevel("debug");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    debug("visible");
    expect(logSpy).toHaveBeenCalledTimes(1);
  });

  it("always logs info regardless of debug level", () => {
    setLogLevel("info");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    info("always");
    expect(logSpy).toHaveBeenCalledTimes(1);
  });

  it("keeps errors when level is error", () => {
    setLogLevel("error");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    info("dropped");
    error("kept");
    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it("rejects unknown levels", () => {
    expect(isLogLevel("verbose")).toBe(false);
    expect(() => setLogLevel("verbose")).toThrow("Unsupported log level: verbose");
  });
});
