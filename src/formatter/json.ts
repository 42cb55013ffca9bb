/**
 * JSON formatter: serializes an AuditReport with snake_case keys for CI
 * consumers. Floats are rounded to four decimals so identical input
 * always produces byte-identical output.
 */

import type { FileVerdict, ProjectVerdict, AuditReport } from "../types/verdict.js";

export function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

function round4OrNull(value: number | null): number | null {
  return value === null ? null : round4(value);
}

function fileEntry(verdict: FileVerdict): Record<string, unknown> {
  const m = verdict.metrics;
  return {
    path: m.path,
    max_cc: m.maxCc,
    mean_cc: round4OrNull(m.meanCc),
    adf: round4(m.adf),
    ccr: round4OrNull(m.ccr),
    technical_lag: m.technicalLag,
    failed: verdict.isFailed,
    reasons: verdict.reasons,
    degraded: verdict.degraded,
    churn_touches: m.churnTouches,
    drift_lines: m.driftLines,
    lag_instances: m.lagInstances,
    halstead_effort: round4OrNull(m.halsteadEffort),
    halstead_difficulty: round4OrNull(m.halsteadDifficulty),
    mi_score: round4OrNull(m.maintainabilityIndex),
    parse_error: m.parseError,
  };
}

function projectEntry(project: ProjectVerdict): Record<string, unknown> {
  return {
    total_files: project.totalFiles,
    measured_files: project.measuredFiles,
    max_cc_overall: project.maxCcOverall,
    mean_cc_overall: round4(project.meanCcOverall),
    max_adf_overall: round4(project.maxAdfOverall),
    polluted_files: project.pollutedFiles,
    mean_ccr: round4OrNull(project.meanCcr),
    max_ccr: round4OrNull(project.maxCcr),
    global_technical_lag: project.globalTechnicalLag,
    lag_instances: project.lagInstances,
    unparseable_files: project.unparseableFiles,
    failed: project.isFailed,
    reasons: project.reasons,
  };
}

/**
 * Plain-object form of the report, as written by `--output` and
 * returned by the MCP `audit` tool.
 */
export function toJsonReport(report: AuditReport): Record<string, unknown> {
  return {
    version: report.version,
    target: report.target,
    mode: report.mode,
    config_source: report.configSource,
    timestamp: report.timestamp,
    files: report.files.map(fileEntry),
    project: report.project === null ? null : projectEntry(report.project),
    exit_code: report.exitCode,
  };
}

export function formatJson(report: AuditReport): string {
  return JSON.stringify(toJsonReport(report), null, 2);
}
