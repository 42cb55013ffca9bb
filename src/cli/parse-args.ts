/**
 * CLI argument parser.
 *
 * Translates a process.argv-style string array into CliOptions or a
 * structured non-run outcome (help, version, MCP, error). Uses only
 * Node.js built-ins; no argument-parsing library.
 *
 * Dependencies: Types layer only.
 */

import { VERSION } from "../version.js";

export type OutputFormat = "terminal" | "json";

export interface CliOptions {
  readonly targetPath: string;
  readonly format: OutputFormat;
  /** JSON report destination; written in addition to stdout output. */
  readonly outputPath?: string | undefined;
  readonly configPath?: string | undefined;
  readonly concurrency?: number | undefined;
  readonly noColor: boolean;
}

/**
 * Non-run results from parsing: help request, version request, MCP mode,
 * or error.
 */
export interface ParseError {
  readonly kind: "error" | "help" | "version" | "mcp";
  readonly message: string;
}

export type ParseResult =
  | { readonly ok: true; readonly value: CliOptions }
  | { readonly ok: false; readonly error: ParseError };

const FORMATS: readonly OutputFormat[] = ["terminal", "json"];

const SHORT_TO_LONG: ReadonlyMap<string, string> = new Map([
  ["-o", "--output"],
  ["-c", "--config"],
  ["-f", "--format"],
  ["-j", "--concurrency"],
  ["-h", "--help"],
  ["-V", "--version"],
]);

const VALUE_FLAGS: ReadonlySet<string> = new Set([
  "--output",
  "--config",
  "--format",
  "--concurrency",
]);

function parseFormat(value: string): OutputFormat | undefined {
  return FORMATS.find((f) => f === value);
}

function failure(message: string): ParseResult {
  return { ok: false, error: { kind: "error", message } };
}

/**
 * Parse a CLI argument array.
 *
 * Expected usage:
 *   archaudit [options] <path>
 */
export function parseArgs(argv: readonly string[]): ParseResult {
  // Expand short flags to their long equivalents before parsing.
  const expanded = argv.map((arg) => SHORT_TO_LONG.get(arg) ?? arg);

  // --help and --version short-circuit everything else.
  if (expanded.includes("--help")) {
    return { ok: false, error: { kind: "help", message: helpText() } };
  }
  if (expanded.includes("--version")) {
    return { ok: false, error: { kind: "version", message: `archaudit ${VERSION}` } };
  }
  if (expanded.includes("--mcp")) {
    return { ok: false, error: { kind: "mcp", message: "Starting MCP server" } };
  }

  let targetPath: string | undefined;
  let outputPath: string | undefined;
  let configPath: string | undefined;
  let format: OutputFormat = "terminal";
  let concurrency: number | undefined;
  let noColor = false;

  for (let i = 0; i < expanded.length; i++) {
    const arg = expanded[i] ?? "";
    const original = argv[i] ?? arg;

    if (VALUE_FLAGS.has(arg)) {
      const value = expanded[i + 1];
      if (value === undefined) {
        return failure(`${original} requires a value`);
      }
      i += 1;

      if (arg === "--output") {
        outputPath = value;
      } else if (arg === "--config") {
        configPath = value;
      } else if (arg === "--format") {
        const parsed = parseFormat(value);
        if (parsed === undefined) {
          return failure(`Unknown format "${value}". Valid formats: ${FORMATS.join(", ")}`);
        }
        format = parsed;
      } else {
        const parsed = Number(value);
        if (!Number.isInteger(parsed) || parsed < 1) {
          return failure(`--concurrency requires a positive integer, got "${value}"`);
        }
        concurrency = parsed;
      }
      continue;
    }

    if (arg === "--no-color") {
      noColor = true;
      continue;
    }

    if (arg.startsWith("-")) {
      return failure(`Unknown flag "${original}"`);
    }

    if (targetPath !== undefined) {
      return failure(`Unexpected argument "${original}": only one target path is accepted`);
    }
    targetPath = arg;
  }

  if (targetPath === undefined) {
    return failure("Missing target path. Usage: archaudit [options] <path>");
  }

  return {
    ok: true,
    value: { targetPath, format, outputPath, configPath, concurrency, noColor },
  };
}

function helpText(): string {
  return [
    "Usage: archaudit [options] <path>",
    "",
    "Audit a source file or directory against an architecture policy:",
    "complexity, drift density, churn and technical lag.",
    "",
    "Options:",
    "  -o, --output <path>       Also write the JSON report to <path> (outside the audited tree)",
    "  -c, --config <path>       Policy file to use instead of searching for .archaudit.yml",
    "  -f, --format <format>     Output format on stdout (terminal, json)",
    "  -j, --concurrency <n>     Maximum files analyzed at once (default 8)",
    "      --no-color            Disable ANSI color codes (also honors NO_COLOR env var)",
    "      --mcp                 Start as MCP server (stdio transport)",
    "  -h, --help                Show this help message",
    "  -V, --version             Show version number",
    "",
    "Exit status: 0 pass, 1 fail, 2 operational error, 130 cancelled.",
  ].join("\n");
}
