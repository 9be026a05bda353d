/**
 * Domain Services
 *
 * Pure algorithms with no external dependencies.
 * These services operate only on domain entities and primitive data.
 */

// Context windows around a match
export { extractContext } from "./contextExtractor";

// Cast detection
export { detectCasts, splitLines, type DetectOptions } from "./castDetector";

// Result index
export { ResultIndex, type LocatedOccurrence } from "./resultIndex";

// Config validation
export {
  validateConfig,
  formatValidationIssues,
  type ValidationIssue,
  type ValidationResult,
} from "./configValidator";
