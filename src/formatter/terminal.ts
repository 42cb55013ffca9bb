/**
 * Terminal formatter: a per-file table plus project summary in directory
 * mode, a detail block in single-file mode. Colour is applied only to
 * the PASS/FAIL labels.
 *
 * Output is deterministic for identical input.
 */

import type { FileVerdict, ProjectVerdict, AuditReport } from "../types/verdict.js";
import type { FormatterOptions } from "./formatter.js";

const ANSI_RESET = "\x1b[0m";
const ANSI_GREEN = "\x1b[32m";
const ANSI_RED = "\x1b[31m";

const TABLE_HEADERS = ["File", "CC", "Mean", "ADF", "CCR", "TL", "Verdict"] as const;

export function verdictLabel(failed: boolean, noColor = false): string {
  const label = failed ? "FAIL" : "PASS";
  if (noColor) {
    return label;
  }
  return `${failed ? ANSI_RED : ANSI_GREEN}${label}${ANSI_RESET}`;
}

function fixedOr(value: number | null, digits: number, fallback: string): string {
  return value === null ? fallback : value.toFixed(digits);
}

function header(report: AuditReport): string[] {
  return [
    `Architecture Audit: ${report.target}`,
    `Policy: ${report.configSource ?? "built-in defaults"}`,
    `Audited at: ${report.timestamp}`,
    "",
  ];
}

function field(name: string, value: string): string {
  return `  ${`${name}:`.padEnd(20)}${value}`;
}

function renderTable(files: readonly FileVerdict[], noColor: boolean): string[] {
  const rows = files.map((f) => [
    f.metrics.path,
    fixedOr(f.metrics.maxCc, 0, "-"),
    fixedOr(f.metrics.meanCc, 2, "-"),
    f.metrics.adf.toFixed(4),
    fixedOr(f.metrics.ccr, 2, "n/a"),
    f.metrics.technicalLag,
  ]);

  // The verdict column is last and never padded, so colour codes do not
  // disturb the width calculation.
  const widths = TABLE_HEADERS.slice(0, -1).map((h, col) =>
    Math.max(h.length, ...rows.map((r) => (r[col] ?? "").length)),
  );
  const line = (cells: readonly string[], last: string): string =>
    [...cells.map((c, col) => c.padEnd(widths[col] ?? 0)), last].join("  ");

  const lines = [
    line(TABLE_HEADERS.slice(0, -1), "Verdict"),
    line(widths.map((w) => "-".repeat(w)), "-------"),
  ];
  rows.forEach((row, i) => {
    lines.push(line(row, verdictLabel(files[i]?.isFailed ?? false, noColor)));
  });
  return lines;
}

function renderFailures(files: readonly FileVerdict[]): string[] {
  const failing = files.filter((f) => f.isFailed || f.degraded);
  if (failing.length === 0) {
    return [];
  }
  const lines = ["", "Findings:"];
  for (const f of failing) {
    lines.push(`  ${f.metrics.path}: ${f.reasons.join("; ")}`);
  }
  return lines;
}

function renderProject(project: ProjectVerdict, noColor: boolean): string[] {
  const lines = [
    "",
    "Project Summary",
    field("Files audited", `${project.totalFiles} (${project.measuredFiles} measured)`),
    field("Max CC", String(project.maxCcOverall)),
    field("Mean CC", project.meanCcOverall.toFixed(2)),
    field("Max ADF", project.maxAdfOverall.toFixed(4)),
    field("Polluted files", String(project.pollutedFiles.length)),
    field("Mean CCR", fixedOr(project.meanCcr, 2, "n/a")),
    field("Max CCR", fixedOr(project.maxCcr, 2, "n/a")),
    field("Technical lag", project.globalTechnicalLag),
  ];
  if (project.unparseableFiles.length > 0) {
    lines.push(field("Unparseable", project.unparseableFiles.join(", ")));
  }
  for (const instance of project.lagInstances) {
    lines.push(`    legacy API at ${instance}`);
  }
  if (project.reasons.length > 0) {
    lines.push(field("Reasons", project.reasons.join("; ")));
  }
  lines.push("");
  lines.push(`Project Verdict: ${verdictLabel(project.isFailed, noColor)}`);
  return lines;
}

function renderFileDetail(file: FileVerdict, noColor: boolean): string[] {
  const m = file.metrics;
  const ccr = m.ccr === null
    ? `n/a (${m.churnUnavailableReason ?? "history unavailable"})`
    : `${m.ccr.toFixed(2)} (${m.churnTouches ?? 0} commits in window)`;
  const drift = m.driftLines.length > 0 ? ` (lines ${m.driftLines.join(", ")})` : "";

  const lines = [
    `File: ${m.path}`,
    field("Max CC", fixedOr(m.maxCc, 0, "-")),
    field("Mean CC", fixedOr(m.meanCc, 2, "-")),
    field("Units", String(m.unitCount)),
    field("ADF", `${m.adf.toFixed(4)}${drift}`),
    field("CCR", ccr),
    field("Technical lag", m.technicalLag),
    field("Halstead effort", fixedOr(m.halsteadEffort, 2, "n/a")),
    field("Maintainability", fixedOr(m.maintainabilityIndex, 2, "n/a")),
  ];
  if (m.parseError !== null) {
    lines.push(field("Parse error", m.parseError));
  }
  for (const instance of m.lagInstances) {
    lines.push(`    legacy API at ${instance}`);
  }
  if (file.reasons.length > 0) {
    lines.push("  Reasons:");
    for (const reason of file.reasons) {
      lines.push(`    - ${reason}`);
    }
  }
  lines.push("");
  lines.push(`Verdict: ${verdictLabel(file.isFailed, noColor)}`);
  return lines;
}

export function formatTerminal(report: AuditReport, options?: FormatterOptions): string {
  const noColor = options?.noColor ?? false;
  const lines = header(report);

  if (report.mode === "file" || report.project === null) {
    for (const file of report.files) {
      lines.push(...renderFileDetail(file, noColor));
    }
    return lines.join("\n");
  }

  lines.push(...renderTable(report.files, noColor));
  lines.push(...renderFailures(report.files));
  lines.push(...renderProject(report.project, noColor));
  return lines.join("\n");
}
