/**
 * CLI runner: the top-level entry point that wires everything together.
 *
 * Responsibilities:
 *   1. Parse arguments into CliOptions
 *   2. Run the orchestrator
 *   3. Format the report for stdout and optionally write the JSON report
 *   4. Map the outcome to a process exit code
 *
 * Dependencies: All layers (Types, Adapter, Orchestration, Formatter).
 */

import * as node_path from "node:path";
import type { HistoryLog } from "../adapter/adapter.js";
import type { Formatter } from "../formatter/formatter.js";
import { formatJson } from "../formatter/json.js";
import { formatTerminal } from "../formatter/terminal.js";
import { audit } from "../orchestration/orchestrator.js";
import type { OutputFormat } from "./parse-args.js";
import { parseArgs } from "./parse-args.js";

export const EXIT_PASS = 0;
export const EXIT_FAIL = 1;
export const EXIT_ERROR = 2;
export const EXIT_CANCELLED = 130;

/**
 * Injectable dependencies for testability.
 * Production code provides real I/O; tests provide fakes.
 */
export interface CliDeps {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  /** Persists the JSON report for `--output`; creates parent directories. */
  readonly writeFn: (path: string, content: string) => Promise<void>;
  readonly history?: HistoryLog | undefined;
  readonly timestampFn?: (() => string) | undefined;
  readonly startMcpServer?: (() => Promise<void>) | undefined;
  /** When true, suppresses ANSI color codes (mirrors the NO_COLOR env var). */
  readonly noColorEnv?: boolean | undefined;
  /** Aborted on SIGINT/SIGTERM. */
  readonly signal?: AbortSignal | undefined;
}

function selectFormatter(format: OutputFormat): Formatter {
  switch (format) {
    case "json":
      return formatJson;
    case "terminal":
      return formatTerminal;
  }
}

/**
 * True when `candidate` is `root` itself or lies beneath it.
 */
export function isWithin(root: string, candidate: string): boolean {
  const rel = node_path.relative(root, candidate);
  const escapes = rel === ".." || rel.startsWith(".." + node_path.sep);
  return !escapes && !node_path.isAbsolute(rel);
}

/**
 * Run the CLI with the given argument array and dependencies.
 * Returns a process exit code: 0 pass, 1 fail, 2 operational error,
 * 130 cancelled.
 */
export async function run(
  argv: readonly string[],
  deps: CliDeps,
): Promise<number> {
  const parseResult = parseArgs(argv);

  if (!parseResult.ok) {
    const { kind, message } = parseResult.error;
    if (kind === "help" || kind === "version") {
      deps.stdout(message);
      return EXIT_PASS;
    }
    if (kind === "mcp") {
      if (deps.startMcpServer === undefined) {
        deps.stderr("MCP server is not available");
        return EXIT_ERROR;
      }
      await deps.startMcpServer();
      return EXIT_PASS;
    }
    deps.stderr(message);
    return EXIT_ERROR;
  }

  const options = parseResult.value;

  // The report must never become part of the tree it describes.
  if (options.outputPath !== undefined) {
    const target = node_path.resolve(options.targetPath);
    const output = node_path.resolve(options.outputPath);
    if (isWithin(target, output)) {
      deps.stderr(`Refusing to write report inside the audited path: ${output}`);
      return EXIT_ERROR;
    }
  }

  const result = await audit(options.targetPath, {
    configPath: options.configPath,
    concurrency: options.concurrency,
    history: deps.history,
    timestampFn: deps.timestampFn,
    signal: deps.signal,
  });

  if (!result.ok) {
    deps.stderr(result.error.message);
    return result.error.kind === "cancelled" ? EXIT_CANCELLED : EXIT_ERROR;
  }

  const { report, warnings } = result.value;
  for (const warning of warnings) {
    deps.stderr(`Warning: ${warning.path}: ${warning.message}`);
  }
  deps.stderr(
    report.configSource === null
      ? "Using built-in default policy"
      : `Using policy ${report.configSource}`,
  );

  const noColor = options.noColor || deps.noColorEnv === true;
  deps.stdout(selectFormatter(options.format)(report, { noColor }));

  if (options.outputPath !== undefined) {
    try {
      await deps.writeFn(options.outputPath, formatJson(report));
    } catch (cause: unknown) {
      const message = cause instanceof Error ? cause.message : String(cause);
      deps.stderr(`Failed to write report: ${message}`);
      return EXIT_ERROR;
    }
    deps.stderr(`Report written to ${options.outputPath}`);
  }

  return report.exitCode === 0 ? EXIT_PASS : EXIT_FAIL;
}
