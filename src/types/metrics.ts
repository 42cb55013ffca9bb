/**
 * Measurement types produced by the analyzers.
 */

export type TechnicalLag = "LOW" | "HIGH";

/**
 * A function-level control-flow unit extracted from one file.
 * Units live only long enough to compute the file's max and mean.
 */
export interface SourceUnit {
  readonly name: string;
  /** 1-based line of the unit's first token. */
  readonly startLine: number;
  /** 1-based line of the unit's last token. */
  readonly endLine: number;
  readonly complexity: number;
}

/**
 * Aggregated measurements for one file. Created once per file per run
 * and never updated.
 */
export interface FileMetrics {
  readonly path: string;
  /** Highest unit complexity; null when the file could not be parsed. */
  readonly maxCc: number | null;
  /** Mean unit complexity; null when the file could not be parsed. */
  readonly meanCc: number | null;
  readonly unitCount: number;
  /** Drift density: matching lines over non-blank lines. */
  readonly adf: number;
  /** 1-based line numbers that matched an illegal pattern. */
  readonly driftLines: readonly number[];
  /** Churn ratio; null when history could not be measured. */
  readonly ccr: number | null;
  readonly churnTouches: number | null;
  readonly churnUnavailableReason: string | null;
  readonly technicalLag: TechnicalLag;
  /** `path:line` evidence for every legacy-API match. */
  readonly lagInstances: readonly string[];
  /** Advisory only; never part of a verdict. */
  readonly halsteadEffort: number | null;
  readonly halsteadDifficulty: number | null;
  /** Maintainability Index on a 0..100 scale. Advisory only. */
  readonly maintainabilityIndex: number | null;
  /** Set when the file was unreadable or syntactically invalid. */
  readonly parseError: string | null;
}
