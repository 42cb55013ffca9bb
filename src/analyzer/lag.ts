/**
 * Technical-lag detector: a presence flag for deprecated API usage.
 * Lag is advisory per file and only counts at project level.
 */

import type { TechnicalLag } from "../types/metrics.js";
import type { PatternSpec } from "../types/policy.js";
import { matchesAny } from "../policy/patterns.js";
import { splitLines } from "./lines.js";

export interface LagResult {
  readonly technicalLag: TechnicalLag;
  /** `path:line` for each matching line. */
  readonly instances: readonly string[];
}

export function detectLag(
  displayPath: string,
  text: string,
  patterns: readonly PatternSpec[],
): LagResult {
  const instances: string[] = [];
  const lines = splitLines(text);
  for (let i = 0; i < lines.length; i++) {
    if (matchesAny(lines[i] ?? "", patterns)) {
      instances.push(`${displayPath}:${i + 1}`);
    }
  }
  return {
    technicalLag: instances.length > 0 ? "HIGH" : "LOW",
    instances,
  };
}
