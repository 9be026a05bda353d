/**
 * Application Use Cases
 *
 * Use cases coordinate domain services and injected infrastructure.
 */

// Discover Files
export {
  discoverFiles,
  hasTrackedExtension,
  type DiscoveryResult,
} from "./discoverFiles";

// Scan File
export { scanFile, type ScanOutcome } from "./scanFile";

// Analyze Directory
export {
  analyzeDirectory,
  type AnalyzeResult,
  type AnalyzeDirectoryOptions,
  type AnalyzeDirectoryDependencies,
} from "./analyzeDirectory";
