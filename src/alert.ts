// CHANGE: Format launcher errors as single-line alert requests.
// WHY: The desktop wrapper renders any stdout line shaped `ALERT:<Title>|<Body>` as a native dialog.
// SOURCE: internal reasoning

import { LauncherError } from "./errors.js";

const ALERT_PREFIX = "ALERT:";

function flatten(text: string): string {
  return text.replace(/\r?\n/g, " ").trim();
}

/**
 * Build the alert line.
 *
 * Invariant: the first `|` of the result separates title from body, so
 * pipes inside the title are replaced.
 */
export function formatAlert(title: string, body: string): string {
  return `${ALERT_PREFIX}${flatten(title).replace(/\|/g, "/")}|${flatten(body)}`;
}

/**
 * Write the alert for a launcher error to stdout, uncoloured.
 */
export function emitAlert(failure: Pick<LauncherError, "title" | "body">, write: (line: string) => void = console.log): void {
  write(formatAlert(failure.title, failure.body));
}
