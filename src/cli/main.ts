#!/usr/bin/env node

/**
 * archaudit CLI entry point.
 *
 * This file is the bin target. It wires together real dependencies
 * (process I/O, filesystem, git history, signals) and delegates to the
 * runner. It uses the global `process`: a namespace import of
 * "node:process" does not carry the EventEmitter methods.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createGitHistoryLog } from "../adapter/git.js";
import { createMcpServer } from "../mcp/server.js";
import { EXIT_ERROR, run } from "./run.js";
import type { CliDeps } from "./run.js";
import { abortOnShutdown, handlesShutdownSignals } from "./signals.js";
import { writeReportFile } from "./write-report.js";

// Strip the first two entries (node binary, script path).
const argv = process.argv.slice(2);

const controller = new AbortController();
if (handlesShutdownSignals(argv)) {
  abortOnShutdown(process, controller);
}

const history = createGitHistoryLog();

const deps: CliDeps = {
  stdout: (text: string) => process.stdout.write(text + "\n"),
  stderr: (text: string) => process.stderr.write(text + "\n"),
  history,
  writeFn: writeReportFile,
  startMcpServer: async () => {
    const server = createMcpServer({ history });
    const transport = new StdioServerTransport();
    await server.connect(transport);
  },
  noColorEnv: process.env["NO_COLOR"] !== undefined && process.env["NO_COLOR"] !== "",
  signal: controller.signal,
};

run(argv, deps).then(
  (code) => {
    // The MCP server keeps the process alive on its own transport.
    if (handlesShutdownSignals(argv)) {
      process.exit(code);
    }
  },
  (cause: unknown) => {
    const message = cause instanceof Error ? (cause.stack ?? cause.message) : String(cause);
    process.stderr.write(`archaudit: unexpected error: ${message}\n`);
    process.exit(EXIT_ERROR);
  },
);
