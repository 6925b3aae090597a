// CHANGE: Verify alert line formatting.
// WHY: The desktop wrapper splits title from body at the first pipe.
// SOURCE: internal reasoning

import { describe, expect, it, vi } from "vitest";
import { emitAlert, formatAlert } from "../src/alert.js";
import { usageError } from "../src/errors.js";

describe("formatAlert", () => {
  it("joins title and body with a single pipe", () => {
    expect(formatAlert("Fatal error", "Python 3.6 or higher is required. Yours is 2.5.4.")).toBe(
      "ALERT:Fatal error|Python 3.6 or higher is required. Yours is 2.5.4."
    );
  });

  it("keeps the alert on one line", () => {
    expect(formatAlert("Usage", "first\nsecond\r\nthird")).toBe("ALERT:Usage|first second third");
  });

  it("keeps the first pipe as the separator", () => {
    expect(formatAlert("A|B", "x|y")).toBe("ALERT:A/B|x|y");
  });
});

describe("emitAlert", () => {
  it("writes exactly one line", () => {
    const write = vi.fn();
    emitAlert(usageError("Drop files here."), write);
    expect(write).toHaveBeenCalledTimes(1);
    expect(write).toHaveBeenCalledWith("ALERT:Usage|Drop files here.");
  });
});
