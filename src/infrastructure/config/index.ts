/**
 * Configuration Infrastructure
 *
 * Resolves the analyzer configuration for a scan.
 */

export { resolveConfig } from "./configResolver";
