/**
 * Configuration Resolver
 *
 * Builds the configuration for a scan from the defaults plus any
 * overrides supplied by a library caller. There is no config file.
 */

import type { AnalyzerConfig } from "../../domain/entities";
import { createDefaultConfig, ConfigError } from "../../domain/entities";
import {
  validateConfig,
  formatValidationIssues,
} from "../../domain/services";

/**
 * Merge overrides over the defaults and validate the result.
 *
 * @param overrides - Fields to replace
 * @returns The merged configuration
 * @throws ConfigError if validation reports any error
 */
export function resolveConfig(
  overrides: Partial<AnalyzerConfig> = {}
): AnalyzerConfig {
  const defaults = createDefaultConfig();
  const config: AnalyzerConfig = {
    extensions: overrides.extensions ?? defaults.extensions,
    contextRadius: overrides.contextRadius ?? defaults.contextRadius,
  };

  const result = validateConfig(config);
  if (!result.valid) {
    throw new ConfigError(
      `Invalid configuration:\n${formatValidationIssues(result.getErrors())}`
    );
  }

  return config;
}
