/**
 * Per-file measurement: runs every analyzer over one file and folds the
 * results into a FileMetrics value.
 */

import * as node_fs from "node:fs/promises";
import type { HistoryLog } from "../adapter/adapter.js";
import { analyzeComplexity } from "../analyzer/complexity.js";
import { measureDrift } from "../analyzer/drift.js";
import { detectLag } from "../analyzer/lag.js";
import { measureChurn } from "../analyzer/churn.js";
import { maintainabilityIndex } from "../analyzer/maintainability.js";
import type { FileMetrics } from "../types/metrics.js";
import type { PolicyConfig } from "../types/policy.js";

export interface AnalyzeFileInput {
  /** Absolute path on disk. */
  readonly filePath: string;
  /** Path shown in reports and lag evidence. */
  readonly displayPath: string;
  readonly policy: PolicyConfig;
  readonly history: HistoryLog;
  readonly signal?: AbortSignal | undefined;
}

/**
 * Measure one file from already-read text. Unlike `analyzeFile`, this
 * never touches the filesystem.
 */
export async function measureText(
  input: AnalyzeFileInput,
  text: string,
): Promise<FileMetrics> {
  const { filePath, displayPath, policy, history, signal } = input;

  const churn = await measureChurn(filePath, policy, history, signal);
  const complexity = analyzeComplexity(filePath, text);
  const drift = measureDrift(text, policy.illegalPatterns);
  const lag = detectLag(displayPath, text, policy.legacyApiPatterns);

  return {
    path: displayPath,
    maxCc: complexity.parsed ? complexity.maxCc : null,
    meanCc: complexity.parsed ? complexity.meanCc : null,
    unitCount: complexity.parsed ? complexity.units.length : 0,
    adf: drift.adf,
    driftLines: drift.driftLines,
    ccr: churn.ccr,
    churnTouches: churn.touches,
    churnUnavailableReason: churn.unavailableReason,
    technicalLag: lag.technicalLag,
    lagInstances: lag.instances,
    halsteadEffort: complexity.parsed ? complexity.halstead.effort : null,
    halsteadDifficulty: complexity.parsed ? complexity.halstead.difficulty : null,
    maintainabilityIndex: complexity.parsed
      ? maintainabilityIndex(
          complexity.halstead.volume,
          complexity.units.reduce((sum, u) => sum + u.complexity, 0),
          drift.nonBlankLines,
        )
      : null,
    parseError: complexity.parsed ? null : complexity.error,
  };
}

/**
 * Read and measure one file. A file that cannot be read is reported as
 * unparseable rather than aborting the run.
 */
export async function analyzeFile(input: AnalyzeFileInput): Promise<FileMetrics> {
  let text: string;
  try {
    text = await node_fs.readFile(input.filePath, "utf-8");
  } catch (cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    return unreadableMetrics(input.displayPath, `unreadable: ${message}`);
  }
  return measureText(input, text);
}

/**
 * Metrics for a path that could not be read at all. It carries no
 * measurements and fails as unparseable.
 */
export function unreadableMetrics(
  displayPath: string,
  parseError: string,
  churnReason = "file could not be read",
): FileMetrics {
  return {
    path: displayPath,
    maxCc: null,
    meanCc: null,
    unitCount: 0,
    adf: 0,
    driftLines: [],
    ccr: null,
    churnTouches: null,
    churnUnavailableReason: churnReason,
    technicalLag: "LOW",
    lagInstances: [],
    halsteadEffort: null,
    halsteadDifficulty: null,
    maintainabilityIndex: null,
    parseError,
  };
}
