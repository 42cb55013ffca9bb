/**
 * MCP server for archaudit.
 *
 * Exposes the audit engine to AI agents via the Model Context Protocol
 * (stdio transport). The server registers an "audit" tool that runs the
 * orchestrator and returns the JSON report as text content.
 *
 * Dependencies: Types, Adapter, Orchestration, Formatter (same level as CLI).
 */

import { z } from "zod";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { HistoryLog } from "../adapter/adapter.js";
import { audit } from "../orchestration/orchestrator.js";
import { formatJson } from "../formatter/json.js";
import { VERSION } from "../version.js";

/**
 * Injectable dependencies for the MCP server.
 */
export interface McpServerDeps {
  readonly history?: HistoryLog | undefined;
  readonly timestampFn?: (() => string) | undefined;
}

/**
 * The shape returned by the audit tool handler.
 */
export interface AuditToolResult {
  readonly content: { type: "text"; text: string }[];
  readonly isError?: boolean;
}

export const AuditArgsSchema = z.object({
  targetPath: z.string().min(1).describe("Absolute path of the file or directory to audit"),
  configPath: z
    .string()
    .min(1)
    .optional()
    .describe("Policy file to use instead of searching for .archaudit.yml"),
});

export type AuditArgs = z.infer<typeof AuditArgsSchema>;

/**
 * Core logic for the audit tool call, extracted for testability.
 *
 * A failing verdict is a normal result; only operational errors (missing
 * target, bad policy, no files) set `isError`.
 */
export async function handleAuditCall(
  args: AuditArgs,
  deps: McpServerDeps,
): Promise<AuditToolResult> {
  const result = await audit(args.targetPath, {
    configPath: args.configPath,
    history: deps.history,
    timestampFn: deps.timestampFn,
  });

  if (!result.ok) {
    return {
      content: [{ type: "text", text: result.error.message }],
      isError: true,
    };
  }

  return {
    content: [{ type: "text", text: formatJson(result.value.report) }],
  };
}

/**
 * Create a configured McpServer instance with the "audit" tool registered.
 *
 * The caller is responsible for connecting the server to a transport
 * (e.g., StdioServerTransport) and starting it.
 */
export function createMcpServer(deps: McpServerDeps = {}): McpServer {
  const server = new McpServer({
    name: "archaudit",
    version: VERSION,
  });

  server.registerTool(
    "audit",
    {
      title: "Architecture Audit",
      description:
        "Audit a source file or directory against its architecture policy " +
        "(cyclomatic complexity, drift density, churn, technical lag). " +
        "Returns the JSON report with per-file and project verdicts.",
      inputSchema: AuditArgsSchema.shape,
    },
    async (args) => {
      const result = await handleAuditCall(args, deps);
      return {
        content: [...result.content],
        isError: result.isError,
      };
    },
  );

  return server;
}
