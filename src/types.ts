// CHANGE: Define typed domain models for the launcher stages.
// WHY: Prober, collector, dispatcher and engine exchange these values and nothing else.
// SOURCE: internal reasoning

/**
 * Interpreter binary chosen for the whole run.
 *
 * @property command - Candidate name that resolved (e.g. `python3`).
 * @property resolvedPath - Absolute location found on the search path.
 */
export interface InterpreterReference {
  readonly command: string;
  readonly resolvedPath: string;
}

/**
 * Major/minor pair used for version gating.
 */
export interface VersionRequirement {
  readonly major: number;
  readonly minor: number;
}

/**
 * Version reported by the interpreter.
 *
 * @property raw - Untouched `major.minor.micro` text, shown to the user.
 */
export interface InterpreterVersion extends VersionRequirement {
  readonly raw: string;
}

/**
 * Result of a successful environment probe.
 */
export interface ProbeResult {
  readonly interpreter: InterpreterReference;
  readonly version: InterpreterVersion;
}

export type LaunchMode = "rename" | "undo" | "usage";

/**
 * Existence snapshot of the two artifacts the dispatcher looks at.
 */
export interface ArtifactState {
  readonly transferFileExists: boolean;
  readonly sessionLogExists: boolean;
}

/**
 * Directive forwarded to the engine; exactly two shapes exist.
 */
export type EngineDirective =
  | { readonly kind: "rename"; readonly transferFile: string }
  | { readonly kind: "undo" };

/**
 * Locations and names describing how the engine is started.
 *
 * Invariant: `extraSearchDir` and `libraryDir` are applied to a copy of the
 * environment, never to `process.env`.
 */
export interface EngineSettings {
  readonly script: string;
  readonly workingDir: string;
  readonly libraryDir: string;
  readonly extraSearchDir: string;
}

/**
 * Outcome of a child process run.
 *
 * @property status - Exit status, or `null` when terminated by a signal.
 * @property stdout - Captured output; empty when output was inherited.
 */
export interface ProcessResult {
  readonly status: number | null;
  readonly stdout: string;
}

/**
 * Options for a single child process run.
 */
export interface ProcessRunOptions {
  readonly env: NodeJS.ProcessEnv;
  readonly cwd?: string;
  readonly captureOutput: boolean;
}

/**
 * Abstraction over child process execution; injected so tests run in process.
 */
export interface ProcessRunner {
  run(command: string, args: readonly string[], options: ProcessRunOptions): Promise<ProcessResult>;
}

/**
 * Final result of a launcher run.
 */
export interface LaunchOutcome {
  readonly mode: Exclude<LaunchMode, "usage">;
  readonly exitCode: number;
  readonly dryRun: boolean;
}
