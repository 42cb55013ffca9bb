/**
 * Orchestrator: coordinates policy loading, the tree walk, per-file
 * analysis and verdict aggregation into one AuditReport.
 *
 * Dependencies flow downward only: Orchestration → Analyzer, Policy,
 * Adapter, Types.
 */

import * as node_fs from "node:fs/promises";
import * as node_path from "node:path";
import type { HistoryLog } from "../adapter/adapter.js";
import { createGitHistoryLog } from "../adapter/git.js";
import { describePolicyError, loadPolicy } from "../policy/loader.js";
import type { PolicyWarning } from "../types/policy.js";
import type { Result } from "../types/result.js";
import { ok, err } from "../types/result.js";
import type { AuditError, AuditMode, AuditReport } from "../types/verdict.js";
import { VERSION } from "../version.js";
import { analyzeFile, unreadableMetrics } from "./analyze-file.js";
import { collectFiles, compareDisplayPaths, toDisplayPath } from "./collect-files.js";
import type { ReaddirFn, UnreadableDir } from "./collect-files.js";
import { isAborted, mapWithConcurrency } from "./pool.js";
import { evaluateFile, evaluateProject, exitCodeFor } from "./verdict.js";

export const DEFAULT_CONCURRENCY = 8;

export interface AuditOptions {
  /** Explicit policy file; disables the upward search. */
  readonly configPath?: string | undefined;
  /** Maximum number of files analyzed at once. */
  readonly concurrency?: number | undefined;
  /** History source for churn. Defaults to the git history log. */
  readonly history?: HistoryLog | undefined;
  /** When provided, generates the timestamp for the report. */
  readonly timestampFn?: (() => string) | undefined;
  /** Aborting it cancels the run and kills in-flight git calls. */
  readonly signal?: AbortSignal | undefined;
  /** Directory lister for the tree walk. Defaults to `fs.readdir`. */
  readonly readdirFn?: ReaddirFn | undefined;
}

export interface AuditOutcome {
  readonly report: AuditReport;
  readonly warnings: readonly PolicyWarning[];
}

const CANCELLED: AuditError = { kind: "cancelled", message: "Audit cancelled" };

async function resolveMode(target: string): Promise<AuditMode | null> {
  try {
    const stat = await node_fs.stat(target);
    if (stat.isDirectory()) {
      return "directory";
    }
    return stat.isFile() ? "file" : null;
  } catch {
    return null;
  }
}

/**
 * Run one audit of a file or directory.
 *
 * Behavior:
 * - A missing target or an unusable policy aborts before any file is read.
 * - A directory with no auditable files is an error, never an empty PASS.
 * - A subdirectory that cannot be listed becomes an unparseable entry.
 * - Files are analyzed with bounded concurrency; the report lists them
 *   sorted by path regardless of completion order.
 * - The project verdict exists only in directory mode.
 */
export async function audit(
  targetPath: string,
  options?: AuditOptions,
): Promise<Result<AuditOutcome, AuditError>> {
  const target = node_path.resolve(targetPath);
  const signal = options?.signal;

  const mode = await resolveMode(target);
  if (mode === null) {
    return err({ kind: "target-missing", message: `Target not found: ${target}` });
  }

  const loaded = await loadPolicy(target, { configPath: options?.configPath });
  if (!loaded.ok) {
    return err({ kind: "policy", message: describePolicyError(loaded.error) });
  }
  const { policy, source, warnings } = loaded.value;

  let files: readonly string[];
  let unreadable: readonly UnreadableDir[] = [];
  let root: string;
  if (mode === "directory") {
    const collected = await collectFiles(target, policy, options?.readdirFn);
    files = collected.files;
    unreadable = collected.unreadable;
    root = target;
    if (files.length === 0 && unreadable.length === 0) {
      return err({ kind: "no-files", message: `No auditable source files under ${target}` });
    }
  } else {
    files = [target];
    root = node_path.dirname(target);
  }

  if (isAborted(signal)) {
    return err(CANCELLED);
  }

  const history = options?.history ?? createGitHistoryLog();
  const metrics = await mapWithConcurrency(
    files,
    options?.concurrency ?? DEFAULT_CONCURRENCY,
    (filePath) =>
      analyzeFile({
        filePath,
        displayPath: toDisplayPath(root, filePath),
        policy,
        history,
        signal,
      }),
    signal,
  );

  // Partial measurements are never reported.
  if (isAborted(signal)) {
    return err(CANCELLED);
  }

  // An unlisted directory is an analysis gap and fails like an unparseable file.
  const measured = [
    ...metrics,
    ...unreadable.map((u) =>
      unreadableMetrics(
        toDisplayPath(root, u.dir),
        `unreadable directory: ${u.message}`,
        "directory could not be read",
      ),
    ),
  ].sort((a, b) => compareDisplayPaths(a.path, b.path));

  const verdicts = measured.map((m) => evaluateFile(m, policy));
  const project = mode === "directory" ? evaluateProject(measured, policy) : null;
  const timestampFn = options?.timestampFn ?? (() => new Date().toISOString());

  const report: AuditReport = {
    target,
    mode,
    configSource: source.path,
    timestamp: timestampFn(),
    version: VERSION,
    files: verdicts,
    project,
    exitCode: exitCodeFor(mode, verdicts, project),
  };

  return ok({ report, warnings });
}
