/**
 * Library entry point: the audit engine without the CLI.
 */

export * from "./types/index.js";
export * from "./policy/index.js";
export * from "./analyzer/index.js";
export * from "./adapter/index.js";
export * from "./orchestration/index.js";
export * from "./formatter/index.js";
export { createMcpServer, handleAuditCall, AuditArgsSchema, type AuditArgs, type McpServerDeps } from "./mcp/server.js";
export { VERSION } from "./version.js";
