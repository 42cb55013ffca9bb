/**
 * Verdict aggregation.
 *
 * File verdicts use strict `>` comparisons against the per-file policy.
 * The project verdict is a second, independent fold over FileMetrics
 * (not over FileVerdicts) that uses `>=` against the project ceilings.
 * It also fails on systemic technical lag, which never fails a file on
 * its own. Because the loader guarantees projectMaxCc <= maxCc, every
 * per-file failure also fails the project.
 */

import type { FileMetrics } from "../types/metrics.js";
import { compareDisplayPaths } from "./collect-files.js";
import type { PolicyConfig } from "../types/policy.js";
import type { AuditMode, ExitCode, FileVerdict, ProjectVerdict } from "../types/verdict.js";

export const FILE_REASONS = {
  unparseable: "unparseable",
  maxCc: "max_cc exceeded",
  adf: "adf exceeded",
  ccr: "ccr exceeded",
} as const;

export const PROJECT_REASONS = {
  maxCc: "max_cc >= project_max_cc",
  adf: "max_adf >= adf_threshold",
  lag: "global technical lag HIGH",
  ccr: "max_ccr exceeded",
  unparseable: "unparseable files present",
} as const;

export function ccrUnknownReason(detail: string | null): string {
  return `ccr unknown: ${detail ?? "history unavailable"}`;
}

/**
 * Decide one file. Pure: the same metrics and policy always give the
 * same verdict.
 */
export function evaluateFile(metrics: FileMetrics, policy: PolicyConfig): FileVerdict {
  const reasons: string[] = [];

  if (metrics.parseError !== null || metrics.maxCc === null) {
    reasons.push(FILE_REASONS.unparseable);
  } else if (metrics.maxCc > policy.maxCc) {
    reasons.push(FILE_REASONS.maxCc);
  }

  if (metrics.adf > policy.adfThreshold) {
    reasons.push(FILE_REASONS.adf);
  }

  let degraded = false;
  if (metrics.ccr === null) {
    degraded = true;
  } else if (metrics.ccr > policy.ccrThreshold) {
    reasons.push(FILE_REASONS.ccr);
  }

  const isFailed = reasons.length > 0;

  // The omission is recorded after the failing predicates.
  if (degraded) {
    reasons.push(ccrUnknownReason(metrics.churnUnavailableReason));
  }

  return { metrics, isFailed, degraded, reasons };
}

function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Fold every file's metrics into the stricter project verdict.
 */
export function evaluateProject(
  files: readonly FileMetrics[],
  policy: PolicyConfig,
): ProjectVerdict {
  const complexities: number[] = [];
  const ccrs: number[] = [];
  const unparseableFiles: string[] = [];
  const pollutedFiles: string[] = [];
  const lagInstances: string[] = [];
  let maxAdfOverall = 0;

  for (const file of files) {
    if (file.parseError !== null || file.maxCc === null) {
      unparseableFiles.push(file.path);
    } else {
      complexities.push(file.maxCc);
    }
    if (file.ccr !== null) {
      ccrs.push(file.ccr);
    }
    if (file.adf > 0) {
      pollutedFiles.push(file.path);
    }
    maxAdfOverall = Math.max(maxAdfOverall, file.adf);
    lagInstances.push(...file.lagInstances);
  }

  const maxCcOverall = complexities.length > 0 ? Math.max(...complexities) : 0;
  const maxCcr = ccrs.length > 0 ? Math.max(...ccrs) : null;
  const globalTechnicalLag = lagInstances.length > 0 ? "HIGH" : "LOW";

  const reasons: string[] = [];
  if (maxCcOverall >= policy.projectMaxCc) {
    reasons.push(PROJECT_REASONS.maxCc);
  }
  if (maxAdfOverall >= policy.adfThreshold) {
    reasons.push(PROJECT_REASONS.adf);
  }
  if (globalTechnicalLag === "HIGH") {
    reasons.push(PROJECT_REASONS.lag);
  }
  if (maxCcr !== null && maxCcr > policy.ccrThreshold) {
    reasons.push(PROJECT_REASONS.ccr);
  }
  if (unparseableFiles.length > 0) {
    reasons.push(PROJECT_REASONS.unparseable);
  }

  return {
    totalFiles: files.length,
    measuredFiles: complexities.length,
    maxCcOverall,
    meanCcOverall: mean(complexities),
    maxAdfOverall,
    pollutedFiles: pollutedFiles.sort(compareDisplayPaths),
    meanCcr: ccrs.length > 0 ? mean(ccrs) : null,
    maxCcr,
    globalTechnicalLag,
    lagInstances,
    unparseableFiles: unparseableFiles.sort(compareDisplayPaths),
    isFailed: reasons.length > 0,
    reasons,
  };
}

/**
 * The process exit status CI callers consume: the project verdict in
 * directory mode, the single file's verdict otherwise.
 */
export function exitCodeFor(
  mode: AuditMode,
  files: readonly FileVerdict[],
  project: ProjectVerdict | null,
): ExitCode {
  if (mode === "directory" && project !== null) {
    return project.isFailed ? 1 : 0;
  }
  return files.some((f) => f.isFailed) ? 1 : 0;
}
