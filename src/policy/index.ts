export {
  POLICY_FILE_NAMES,
  type LoadPolicyOptions,
  findPolicyFile,
  defaultPolicy,
  parsePolicy,
  loadPolicy,
  describePolicyError,
} from "./loader.js";
export { compilePattern, compilePatterns, matchesAny } from "./patterns.js";
export { PolicyFileSchema, type PolicyFile } from "./schema.js";
