/**
 * History-log adapter interface.
 *
 * The churn analyzer never talks to git directly. It asks a HistoryLog
 * how many distinct commits touched a file within a recent window. The
 * git-backed implementation lives in git.ts; tests supply fakes.
 */

/**
 * Outcome of a history query. An unavailable result is never the same
 * as zero touches.
 */
export type TouchCount =
  | { readonly available: true; readonly touches: number }
  | { readonly available: false; readonly reason: string };

export interface FetchTouchesOptions {
  /** Upper bound on each subprocess invocation. */
  readonly timeoutMs?: number;
  /** Run-level cancellation; in-flight queries are abandoned. */
  readonly signal?: AbortSignal;
}

/**
 * The contract every history source must fulfill.
 */
export interface HistoryLog {
  /** Identifier for messages (e.g., "git"). */
  readonly id: string;

  /**
   * Count distinct commits touching `filePath` in the last
   * `windowDays` days.
   */
  fetchRecentTouches(
    filePath: string,
    windowDays: number,
    options?: FetchTouchesOptions,
  ): Promise<TouchCount>;
}
