// CHANGE: Closed set of user-facing launcher failures.
// WHY: Core stages throw these; only the CLI boundary turns them into alerts and exit codes.
// SOURCE: internal reasoning

export type LauncherErrorKind = "EnvironmentError" | "UsageError";

export const PRECONDITION_EXIT_CODE = 2;

/**
 * Failure reported to the user through the alert channel.
 *
 * @property title - Alert title, e.g. `Fatal error` or `Usage`.
 * @property body - Alert body shown under the title.
 */
export class LauncherError extends Error {
  readonly exitCode = PRECONDITION_EXIT_CODE;

  constructor(
    readonly kind: LauncherErrorKind,
    readonly title: string,
    readonly body: string
  ) {
    super(`${title}: ${body}`);
    this.name = kind;
  }
}

export function isLauncherError(value: unknown): value is LauncherError {
  return value instanceof LauncherError;
}

export function environmentError(body: string): LauncherError {
  return new LauncherError("EnvironmentError", "Fatal error", body);
}

export function usageError(body: string): LauncherError {
  return new LauncherError("UsageError", "Usage", body);
}
