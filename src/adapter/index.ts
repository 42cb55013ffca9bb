export {
  type TouchCount,
  type FetchTouchesOptions,
  type HistoryLog,
} from "./adapter.js";
export {
  type GitExecFn,
  type GitExecOptions,
  type GitExecResult,
  createGitHistoryLog,
  countDistinctCommits,
  toExecFailure,
} from "./git.js";
