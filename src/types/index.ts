export { type Result, ok, err } from "./result.js";
export {
  type PatternSpec,
  type PolicyConfig,
  type PolicySource,
  type PolicyWarning,
  type LoadedPolicy,
  type PolicyError,
  type PolicyErrorKind,
} from "./policy.js";
export {
  type TechnicalLag,
  type SourceUnit,
  type FileMetrics,
} from "./metrics.js";
export {
  type FileVerdict,
  type ProjectVerdict,
  type AuditMode,
  type ExitCode,
  type AuditReport,
  type AuditErrorKind,
  type AuditError,
} from "./verdict.js";
