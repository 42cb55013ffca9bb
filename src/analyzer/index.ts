export {
  type ComplexityResult,
  analyzeComplexity,
  collectUnits,
  findSyntaxError,
  parseSource,
  scriptKindFor,
} from "./complexity.js";
export { type HalsteadMetrics, measureHalstead, computeHalstead } from "./halstead.js";
export { type DriftResult, measureDrift } from "./drift.js";
export { type LagResult, detectLag } from "./lag.js";
export { type ChurnResult, churnRatio, measureChurn } from "./churn.js";
export { maintainabilityIndex } from "./maintainability.js";
export { splitLines } from "./lines.js";
