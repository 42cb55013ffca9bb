/**
 * Drift detector.
 *
 * Measures architecture drift as a density: lines that match an illegal
 * (presentation or I/O) pattern divided by non-blank lines. One stray
 * diagnostic line in a large module scores lower than the same line in
 * a ten-line module. Blank lines never count toward the denominator.
 */

import type { PatternSpec } from "../types/policy.js";
import { matchesAny } from "../policy/patterns.js";
import { splitLines } from "./lines.js";

export interface DriftResult {
  readonly adf: number;
  /** 1-based line numbers of matching lines. */
  readonly driftLines: readonly number[];
  readonly nonBlankLines: number;
}

export function measureDrift(text: string, patterns: readonly PatternSpec[]): DriftResult {
  const driftLines: number[] = [];
  let nonBlankLines = 0;

  const lines = splitLines(text);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? "";
    if (line.trim().length === 0) {
      continue;
    }
    nonBlankLines += 1;
    if (matchesAny(line, patterns)) {
      driftLines.push(i + 1);
    }
  }

  return {
    adf: nonBlankLines === 0 ? 0 : driftLines.length / nonBlankLines,
    driftLines,
    nonBlankLines,
  };
}
