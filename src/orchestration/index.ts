export {
  type AuditOptions,
  type AuditOutcome,
  DEFAULT_CONCURRENCY,
  audit,
} from "./orchestrator.js";
export {
  FILE_REASONS,
  PROJECT_REASONS,
  ccrUnknownReason,
  evaluateFile,
  evaluateProject,
  exitCodeFor,
} from "./verdict.js";
export { collectFiles, compareDisplayPaths, isAuditable, toDisplayPath } from "./collect-files.js";
export type { CollectedFiles, DirEntry, ReaddirFn, UnreadableDir } from "./collect-files.js";
export { mapWithConcurrency } from "./pool.js";
export { type AnalyzeFileInput, analyzeFile, measureText } from "./analyze-file.js";
