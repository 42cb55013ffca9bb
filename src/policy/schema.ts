/**
 * Policy file schema (.archaudit.yml).
 *
 * Keys are flat and snake_case. Every key is optional; missing keys fall
 * back to the built-in defaults. Keys the schema does not know are
 * reported as warnings by the loader, not rejected.
 */

import { z } from "zod";

const patternList = z.array(z.string().min(1, "patterns must be non-empty strings"));

export const PolicyFileSchema = z.object({
  max_cc: z.number().int().positive().optional(),
  adf_threshold: z.number().finite().nonnegative().optional(),
  ccr_threshold: z.number().finite().nonnegative().max(1).optional(),
  project_max_cc: z.number().int().positive().optional(),
  illegal_patterns: patternList.optional(),
  legacy_api_patterns: patternList.optional(),
  excluded_dirs: z.array(z.string().min(1)).optional(),
  extensions: z
    .array(z.string().regex(/^\.[A-Za-z0-9.]+$/, "extensions must start with a dot"))
    .optional(),
  churn_window_days: z.number().int().positive().optional(),
  churn_baseline: z.number().finite().positive().optional(),
  git_timeout_ms: z.number().int().positive().optional(),
});

export type PolicyFile = z.infer<typeof PolicyFileSchema>;

export const KNOWN_POLICY_KEYS: ReadonlySet<string> = new Set(
  Object.keys(PolicyFileSchema.shape),
);

/**
 * Renders zod issues as `key: message` lines.
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const key = issue.path.join(".");
      return key.length > 0 ? `${key}: ${issue.message}` : issue.message;
    })
    .join("; ");
}
