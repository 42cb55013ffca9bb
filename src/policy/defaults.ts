/**
 * Built-in policy defaults, used for any key a policy file leaves out.
 */

export const DEFAULT_MAX_CC = 20;
export const DEFAULT_ADF_THRESHOLD = 0.05;
export const DEFAULT_CCR_THRESHOLD = 0.3;

/** Gap between the per-file and project complexity ceilings. */
export const PROJECT_MAX_CC_MARGIN = 5;

export const DEFAULT_CHURN_WINDOW_DAYS = 14;
export const DEFAULT_CHURN_BASELINE = 10;
export const DEFAULT_GIT_TIMEOUT_MS = 5000;

/**
 * Presentation and I/O calls that do not belong in business logic.
 */
export const DEFAULT_ILLEGAL_PATTERNS: readonly string[] = [
  "console.log(",
  "console.info(",
  "console.warn(",
  "console.error(",
  "console.debug(",
  "console.table(",
  "process.stdout.write(",
  "process.stderr.write(",
  "alert(",
  "document.write(",
  "readline.createInterface(",
  "prompt(",
];

/**
 * Legacy Node interfaces that have a modern replacement.
 */
export const DEFAULT_LEGACY_API_PATTERNS: readonly string[] = [
  "new Buffer(",
  "fs.exists(",
  "url.parse(",
  "require('path')",
  "require(\"path\")",
  "__dirname",
  "__filename",
];

export const DEFAULT_EXCLUDED_DIRS: readonly string[] = [
  "node_modules",
  "dist",
  "build",
  "coverage",
  ".git",
  ".next",
];

export const DEFAULT_EXTENSIONS: readonly string[] = [
  ".ts",
  ".tsx",
  ".mts",
  ".cts",
  ".js",
  ".jsx",
  ".mjs",
  ".cjs",
];

/**
 * Derives the project ceiling when a policy sets only `max_cc`.
 */
export function defaultProjectMaxCc(maxCc: number): number {
  return Math.max(1, maxCc - PROJECT_MAX_CC_MARGIN);
}
