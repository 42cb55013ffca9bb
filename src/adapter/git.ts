/**
 * Git history adapter.
 *
 * Implements HistoryLog on top of the git CLI:
 *   1. `git ls-files --error-unmatch` confirms the file is tracked
 *   2. `git log --since=<N> days ago --format=%H` lists commits in window
 *   3. Distinct hashes are counted
 *
 * Both commands run through execFile (no shell) with a timeout and the
 * run's AbortSignal. Any failure degrades to "unavailable".
 */

import * as node_path from "node:path";
import type { FetchTouchesOptions, HistoryLog, TouchCount } from "./adapter.js";

// ---------------------------------------------------------------------------
// Exec function type, injectable for testing
// ---------------------------------------------------------------------------

export interface GitExecOptions {
  readonly cwd: string;
  readonly timeoutMs: number;
  readonly signal?: AbortSignal;
}

export type GitExecResult =
  | { readonly ok: true; readonly stdout: string }
  | {
      readonly ok: false;
      readonly error: string;
      readonly timedOut: boolean;
      readonly aborted: boolean;
      /** The git binary could not be found. */
      readonly missing: boolean;
    };

export type GitExecFn = (
  args: readonly string[],
  options: GitExecOptions,
) => Promise<GitExecResult>;

export const DEFAULT_TIMEOUT_MS = 5000;

const MAX_BUFFER = 16 * 1024 * 1024;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Count distinct commit hashes in `git log --format=%H` output.
 */
export function countDistinctCommits(stdout: string): number {
  const hashes = new Set<string>();
  for (const line of stdout.split("\n")) {
    const hash = line.trim();
    if (hash.length > 0) {
      hashes.add(hash);
    }
  }
  return hashes.size;
}

function unavailableReason(result: GitExecResult, fallback: string): string {
  if (result.ok) {
    return fallback;
  }
  if (result.missing) {
    return "git unavailable";
  }
  if (result.aborted) {
    return "history query cancelled";
  }
  if (result.timedOut) {
    return "history query timed out";
  }
  return fallback;
}

// ---------------------------------------------------------------------------
// Default exec function: invokes git via child_process
// ---------------------------------------------------------------------------

function isAbortError(cause: unknown): boolean {
  return cause instanceof Error && cause.name === "AbortError";
}

function isNotFound(cause: unknown): boolean {
  return cause instanceof Error && "code" in cause && cause.code === "ENOENT";
}

function wasKilled(cause: unknown): boolean {
  return cause instanceof Error && "killed" in cause && cause.killed === true;
}

/**
 * Classify an execFile rejection.
 */
export function toExecFailure(cause: unknown): GitExecResult {
  const message = cause instanceof Error ? cause.message : String(cause);
  const aborted = isAbortError(cause);
  return {
    ok: false,
    error: message,
    aborted,
    timedOut: !aborted && wasKilled(cause),
    missing: isNotFound(cause),
  };
}

async function defaultExecFn(
  args: readonly string[],
  options: GitExecOptions,
): Promise<GitExecResult> {
  const { execFile } = await import("node:child_process");
  const { promisify } = await import("node:util");
  const execFileAsync = promisify(execFile);

  try {
    const { stdout } = await execFileAsync("git", [...args], {
      cwd: options.cwd,
      timeout: options.timeoutMs,
      signal: options.signal,
      maxBuffer: MAX_BUFFER,
      windowsHide: true,
      encoding: "utf8",
    });
    return { ok: true, stdout };
  } catch (cause: unknown) {
    return toExecFailure(cause);
  }
}

// ---------------------------------------------------------------------------
// Adapter factory
// ---------------------------------------------------------------------------

/**
 * Create a git-backed history log.
 *
 * @param execFn - Optional injectable exec function for testing.
 *                 Defaults to invoking the real git binary.
 */
export function createGitHistoryLog(execFn?: GitExecFn): HistoryLog {
  const exec = execFn ?? defaultExecFn;

  return {
    id: "git",

    async fetchRecentTouches(
      filePath: string,
      windowDays: number,
      options?: FetchTouchesOptions,
    ): Promise<TouchCount> {
      const execOptions: GitExecOptions = {
        cwd: node_path.dirname(filePath),
        timeoutMs: options?.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        signal: options?.signal,
      };
      const name = node_path.basename(filePath);

      const tracked = await exec(["ls-files", "--error-unmatch", "--", name], execOptions);
      if (!tracked.ok) {
        return {
          available: false,
          reason: unavailableReason(tracked, "file is not tracked by git"),
        };
      }

      const log = await exec(
        ["log", `--since=${windowDays} days ago`, "--format=%H", "--", name],
        execOptions,
      );
      if (!log.ok) {
        return {
          available: false,
          reason: unavailableReason(log, "git log failed"),
        };
      }

      return { available: true, touches: countDistinctCommits(log.stdout) };
    },
  };
}
