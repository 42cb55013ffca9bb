/**
 * Line-pattern compilation.
 *
 * Policy patterns are plain substrings unless written as `/source/flags`,
 * in which case they are compiled as regular expressions. Compilation
 * happens once, at policy load time, so a bad pattern aborts the run
 * before any file is read.
 */

import type { PatternSpec } from "../types/policy.js";
import type { Result } from "../types/result.js";
import { ok, err } from "../types/result.js";

const REGEX_FORM = /^\/(.+)\/([a-z]*)$/s;

// g and y make RegExp.test stateful across lines.
const ALLOWED_FLAGS: ReadonlySet<string> = new Set(["i", "m", "s", "u"]);

export function compilePattern(source: string): Result<PatternSpec, string> {
  const match = REGEX_FORM.exec(source);
  if (match === null) {
    return ok({
      source,
      kind: "literal",
      test: (line: string) => line.includes(source),
    });
  }

  const body = match[1] ?? "";
  const flags = match[2] ?? "";
  for (const flag of flags) {
    if (!ALLOWED_FLAGS.has(flag)) {
      return err(`pattern ${source}: unsupported flag "${flag}"`);
    }
  }

  let regex: RegExp;
  try {
    regex = new RegExp(body, flags);
  } catch (cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    return err(`pattern ${source}: ${message}`);
  }

  return ok({
    source,
    kind: "regex",
    test: (line: string) => regex.test(line),
  });
}

/**
 * Compiles every pattern, failing on the first one that does not compile.
 */
export function compilePatterns(
  sources: readonly string[],
): Result<readonly PatternSpec[], string> {
  const compiled: PatternSpec[] = [];
  for (const source of sources) {
    const result = compilePattern(source);
    if (!result.ok) {
      return result;
    }
    compiled.push(result.value);
  }
  return ok(Object.freeze(compiled));
}

/**
 * True when any pattern matches the line.
 */
export function matchesAny(line: string, patterns: readonly PatternSpec[]): boolean {
  return patterns.some((p) => p.test(line));
}
