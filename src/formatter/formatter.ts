/**
 * Formatter interface for turning an AuditReport into output text.
 *
 * Each output format (terminal, JSON) is a function conforming to this
 * type. Formatters depend only on the Types layer and never decide a
 * verdict themselves.
 */

import type { AuditReport } from "../types/verdict.js";

/**
 * Options that control formatter output behavior.
 */
export interface FormatterOptions {
  /** Disable ANSI color codes in terminal output. */
  readonly noColor?: boolean;
}

export type Formatter = (report: AuditReport, options?: FormatterOptions) => string;
