/**
 * Policy loader.
 *
 * Resolves the effective PolicyConfig for a target path. The loader looks
 * for a policy file in the target's directory and then in each ancestor,
 * the way git finds its configuration. The search stops after the
 * repository root (a directory holding `.git`) or the filesystem root.
 * The nearest file wins.
 *
 * Malformed or invalid policy files are fatal. The loader never falls
 * back to defaults when a file exists but cannot be used.
 */

import * as node_fs from "node:fs/promises";
import * as node_path from "node:path";
import { parse } from "yaml";
import type {
  LoadedPolicy,
  PolicyConfig,
  PolicyError,
  PolicyWarning,
} from "../types/policy.js";
import type { Result } from "../types/result.js";
import { ok, err } from "../types/result.js";
import {
  DEFAULT_ADF_THRESHOLD,
  DEFAULT_CCR_THRESHOLD,
  DEFAULT_CHURN_BASELINE,
  DEFAULT_CHURN_WINDOW_DAYS,
  DEFAULT_EXCLUDED_DIRS,
  DEFAULT_EXTENSIONS,
  DEFAULT_GIT_TIMEOUT_MS,
  DEFAULT_ILLEGAL_PATTERNS,
  DEFAULT_LEGACY_API_PATTERNS,
  DEFAULT_MAX_CC,
  defaultProjectMaxCc,
} from "./defaults.js";
import { compilePatterns } from "./patterns.js";
import { KNOWN_POLICY_KEYS, PolicyFileSchema, describeIssues } from "./schema.js";
import type { PolicyFile } from "./schema.js";

export const POLICY_FILE_NAMES: readonly string[] = [".archaudit.yml", ".archaudit.yaml"];

export interface LoadPolicyOptions {
  /** Explicit policy file; disables the upward search. */
  readonly configPath?: string | undefined;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await node_fs.stat(path)).isFile();
  } catch {
    return false;
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await node_fs.access(path);
    return true;
  } catch {
    return false;
  }
}

async function searchStart(target: string): Promise<string> {
  const absolute = node_path.resolve(target);
  try {
    const stat = await node_fs.stat(absolute);
    return stat.isDirectory() ? absolute : node_path.dirname(absolute);
  } catch {
    return node_path.dirname(absolute);
  }
}

/**
 * Find the nearest policy file for `target`, or null if none exists
 * between the target and the repository (or filesystem) root.
 */
export async function findPolicyFile(target: string): Promise<string | null> {
  let dir = await searchStart(target);

  for (;;) {
    for (const name of POLICY_FILE_NAMES) {
      const candidate = node_path.join(dir, name);
      if (await isFile(candidate)) {
        return candidate;
      }
    }

    if (await exists(node_path.join(dir, ".git"))) {
      return null;
    }

    const parent = node_path.dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Build the default policy. Always succeeds: the built-in patterns are
 * plain literals.
 */
export function defaultPolicy(): PolicyConfig {
  const result = buildPolicy({}, "<defaults>");
  if (!result.ok) {
    throw new Error(`Built-in policy is invalid: ${result.error.message}`);
  }
  return result.value;
}

function buildPolicy(file: PolicyFile, path: string): Result<PolicyConfig, PolicyError> {
  const maxCc = file.max_cc ?? DEFAULT_MAX_CC;
  const projectMaxCc = file.project_max_cc ?? defaultProjectMaxCc(maxCc);

  if (projectMaxCc > maxCc) {
    return err({
      kind: "invalid",
      path,
      message: `project_max_cc (${projectMaxCc}) must not exceed max_cc (${maxCc})`,
    });
  }

  const illegal = compilePatterns(file.illegal_patterns ?? DEFAULT_ILLEGAL_PATTERNS);
  if (!illegal.ok) {
    return err({ kind: "pattern", path, message: `illegal_patterns: ${illegal.error}` });
  }

  const legacy = compilePatterns(file.legacy_api_patterns ?? DEFAULT_LEGACY_API_PATTERNS);
  if (!legacy.ok) {
    return err({ kind: "pattern", path, message: `legacy_api_patterns: ${legacy.error}` });
  }

  const policy: PolicyConfig = {
    maxCc,
    adfThreshold: file.adf_threshold ?? DEFAULT_ADF_THRESHOLD,
    ccrThreshold: file.ccr_threshold ?? DEFAULT_CCR_THRESHOLD,
    projectMaxCc,
    illegalPatterns: illegal.value,
    legacyApiPatterns: legacy.value,
    excludedDirs: Object.freeze([...(file.excluded_dirs ?? DEFAULT_EXCLUDED_DIRS)]),
    extensions: Object.freeze([...(file.extensions ?? DEFAULT_EXTENSIONS)]),
    churnWindowDays: file.churn_window_days ?? DEFAULT_CHURN_WINDOW_DAYS,
    churnBaseline: file.churn_baseline ?? DEFAULT_CHURN_BASELINE,
    gitTimeoutMs: file.git_timeout_ms ?? DEFAULT_GIT_TIMEOUT_MS,
  };

  return ok(Object.freeze(policy));
}

/**
 * Parse policy file text. `path` is used only in messages.
 */
export function parsePolicy(
  text: string,
  path: string,
): Result<{ policy: PolicyConfig; warnings: readonly PolicyWarning[] }, PolicyError> {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    return err({ kind: "malformed", path, message: `invalid YAML: ${message}` });
  }

  // An empty document means "all defaults".
  const doc: unknown = raw ?? {};
  if (doc === null || typeof doc !== "object" || Array.isArray(doc)) {
    return err({ kind: "malformed", path, message: "root must be a mapping" });
  }

  const warnings: PolicyWarning[] = [];
  for (const key of Object.keys(doc)) {
    if (!KNOWN_POLICY_KEYS.has(key)) {
      warnings.push({ path, message: `unknown key "${key}" ignored` });
    }
  }

  const parsed = PolicyFileSchema.safeParse(doc);
  if (!parsed.success) {
    return err({ kind: "invalid", path, message: describeIssues(parsed.error) });
  }

  const built = buildPolicy(parsed.data, path);
  if (!built.ok) {
    return built;
  }
  return ok({ policy: built.value, warnings });
}

async function readPolicyFile(path: string): Promise<Result<LoadedPolicy, PolicyError>> {
  let text: string;
  try {
    text = await node_fs.readFile(path, "utf-8");
  } catch (cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    return err({ kind: "unreadable", path, message });
  }

  const parsed = parsePolicy(text, path);
  if (!parsed.ok) {
    return parsed;
  }
  return ok({
    policy: parsed.value.policy,
    source: { path },
    warnings: parsed.value.warnings,
  });
}

/**
 * Resolve the effective policy for `target`.
 */
export async function loadPolicy(
  target: string,
  options?: LoadPolicyOptions,
): Promise<Result<LoadedPolicy, PolicyError>> {
  if (options?.configPath !== undefined) {
    const explicit = node_path.resolve(options.configPath);
    if (!(await isFile(explicit))) {
      return err({
        kind: "missing",
        path: explicit,
        message: "policy file does not exist",
      });
    }
    return readPolicyFile(explicit);
  }

  const found = await findPolicyFile(target);
  if (found === null) {
    return ok({ policy: defaultPolicy(), source: { path: null }, warnings: [] });
  }
  return readPolicyFile(found);
}

/**
 * One-line description of a policy error, suitable for stderr.
 */
export function describePolicyError(error: PolicyError): string {
  return `Invalid policy ${error.path}: ${error.message}`;
}
