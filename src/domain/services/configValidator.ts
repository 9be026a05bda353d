/**
 * Configuration Validator
 *
 * Checks an analyzer configuration before a scan starts.
 */

import type { AnalyzerConfig } from "../entities/config";

/**
 * Validation result for a single field.
 */
export interface ValidationIssue {
  /** The path to the invalid field (e.g., "extensions[0]") */
  path: string;

  /** The type of issue: error (invalid), warning (suboptimal) */
  severity: "error" | "warning";

  /** Human-readable description of the issue */
  message: string;

  /** Suggested fix (optional) */
  suggestion?: string;
}

/**
 * Overall validation result.
 */
export interface ValidationResult {
  /** Whether the configuration is valid (no errors) */
  valid: boolean;

  /** List of all issues found */
  issues: ValidationIssue[];

  getErrors(): ValidationIssue[];
  getWarnings(): ValidationIssue[];
}

/**
 * Validate an analyzer configuration.
 *
 * @param config - The configuration to validate
 * @returns Validation result with any issues found
 */
export function validateConfig(config: AnalyzerConfig): ValidationResult {
  const issues: ValidationIssue[] = [];

  if (config.extensions.length === 0) {
    issues.push({
      path: "extensions",
      severity: "error",
      message: "At least one file extension is required",
      suggestion: "Use the defaults: .cpp, .h, .hpp",
    });
  }

  const seen = new Set<string>();
  config.extensions.forEach((ext, i) => {
    if (!ext.startsWith(".") || ext.length < 2) {
      issues.push({
        path: `extensions[${i}]`,
        severity: "error",
        message: `Extension '${ext}' must start with a dot`,
        suggestion: `Use '.${ext.replace(/^\.+/, "")}'`,
      });
    } else if (seen.has(ext)) {
      issues.push({
        path: `extensions[${i}]`,
        severity: "warning",
        message: `Extension '${ext}' is listed more than once`,
      });
    }
    seen.add(ext);
  });

  if (!Number.isInteger(config.contextRadius) || config.contextRadius < 0) {
    issues.push({
      path: "contextRadius",
      severity: "error",
      message: `Context radius must be a non-negative integer, got ${config.contextRadius}`,
    });
  }

  return createValidationResult(issues);
}

/**
 * Format validation issues for display.
 */
export function formatValidationIssues(issues: ValidationIssue[]): string {
  return issues
    .map((issue) => {
      const line = `[${issue.severity.toUpperCase()}] ${issue.path}: ${issue.message}`;
      return issue.suggestion ? `${line} (${issue.suggestion})` : line;
    })
    .join("\n");
}

function createValidationResult(issues: ValidationIssue[]): ValidationResult {
  return {
    valid: !issues.some((i) => i.severity === "error"),
    issues,
    getErrors: () => issues.filter((i) => i.severity === "error"),
    getWarnings: () => issues.filter((i) => i.severity === "warning"),
  };
}
