/**
 * Verdict and report types.
 */

import type { FileMetrics, TechnicalLag } from "./metrics.js";

export interface FileVerdict {
  readonly metrics: FileMetrics;
  readonly isFailed: boolean;
  /** True when a predicate had to be skipped (unknown churn). */
  readonly degraded: boolean;
  /** Ordered, machine-matchable reason strings. */
  readonly reasons: readonly string[];
}

export interface ProjectVerdict {
  readonly totalFiles: number;
  /** Files whose complexity was measured (unparseable files excluded). */
  readonly measuredFiles: number;
  readonly maxCcOverall: number;
  readonly meanCcOverall: number;
  readonly maxAdfOverall: number;
  /** Files with any drift line, sorted by path. */
  readonly pollutedFiles: readonly string[];
  /** Mean/max over files with known churn; null when none is known. */
  readonly meanCcr: number | null;
  readonly maxCcr: number | null;
  readonly globalTechnicalLag: TechnicalLag;
  readonly lagInstances: readonly string[];
  readonly unparseableFiles: readonly string[];
  readonly isFailed: boolean;
  readonly reasons: readonly string[];
}

export type AuditMode = "file" | "directory";

export type ExitCode = 0 | 1;

/**
 * Full output of one run. Built once at the end and never persisted by
 * the engine itself.
 */
export interface AuditReport {
  /** Absolute path of the audited file or directory. */
  readonly target: string;
  readonly mode: AuditMode;
  /** Policy file used, or null for built-in defaults. */
  readonly configSource: string | null;
  /** ISO 8601 timestamp of the run. */
  readonly timestamp: string;
  readonly version: string;
  /** Sorted by path. */
  readonly files: readonly FileVerdict[];
  /** Present only in directory mode. */
  readonly project: ProjectVerdict | null;
  readonly exitCode: ExitCode;
}

export type AuditErrorKind = "target-missing" | "no-files" | "cancelled" | "policy";

/**
 * Operational failure of a run. No report exists when one is returned.
 */
export interface AuditError {
  readonly kind: AuditErrorKind;
  readonly message: string;
}
