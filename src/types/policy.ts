/**
 * Policy types.
 *
 * A PolicyConfig is resolved once per run and then shared read-only by
 * every analyzer call. Nothing in the engine mutates it after loading.
 */

/**
 * A compiled line pattern.
 */
export interface PatternSpec {
  /** The pattern as written in the policy file. */
  readonly source: string;
  readonly kind: "literal" | "regex";
  /** Whether one line of source text matches. */
  readonly test: (line: string) => boolean;
}

export interface PolicyConfig {
  /** Per-file ceiling on the maximum unit complexity (strict `>` fails). */
  readonly maxCc: number;
  /** Per-file drift density ceiling; also the project ceiling (`>=` fails). */
  readonly adfThreshold: number;
  /** Churn ratio ceiling, per file and per project. */
  readonly ccrThreshold: number;
  /** Project ceiling on the highest unit complexity (`>=` fails). */
  readonly projectMaxCc: number;
  readonly illegalPatterns: readonly PatternSpec[];
  readonly legacyApiPatterns: readonly PatternSpec[];
  /** Directory names skipped during the tree walk. */
  readonly excludedDirs: readonly string[];
  /** File extensions (with leading dot) treated as auditable source. */
  readonly extensions: readonly string[];
  /** Length of the recent history window, in days. */
  readonly churnWindowDays: number;
  /** Commits within the window that map to a churn ratio of 1.0. */
  readonly churnBaseline: number;
  /** Per-invocation timeout for history-log subprocesses. */
  readonly gitTimeoutMs: number;
}

/**
 * Where the effective policy came from. `path` is null when no policy
 * file was found and built-in defaults apply.
 */
export interface PolicySource {
  readonly path: string | null;
}

/**
 * A non-fatal problem found while loading a policy file.
 */
export interface PolicyWarning {
  readonly path: string;
  readonly message: string;
}

export interface LoadedPolicy {
  readonly policy: PolicyConfig;
  readonly source: PolicySource;
  readonly warnings: readonly PolicyWarning[];
}

export type PolicyErrorKind =
  | "malformed"
  | "invalid"
  | "pattern"
  | "unreadable"
  | "missing";

/**
 * Fatal policy failure. The run aborts before any file is scanned.
 */
export interface PolicyError {
  readonly kind: PolicyErrorKind;
  readonly path: string;
  readonly message: string;
}
