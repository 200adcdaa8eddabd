import chalk from "chalk";

import type { GenerationResult } from "../testgen/types.js";
import type { ValidationReport } from "../validation/types.js";

/**
 * Output format types
 */
export type OutputFormat = "terminal" | "json";

const OUTPUT_FORMATS: readonly OutputFormat[] = ["terminal", "json"];

export function isValidOutputFormat(format: string): format is OutputFormat {
  return OUTPUT_FORMATS.some((known) => known === format);
}

/**
 * Format a validation report for terminal output with colors
 */
export function formatReportTerminal(report: ValidationReport): string {
  const lines: string[] = [];

  lines.push(report.valid ? chalk.green("✓ Validation passed") : chalk.red("✗ Validation failed"));

  for (const error of report.errors) {
    lines.push(chalk.red(`  error: ${error}`));
  }
  for (const warning of report.warnings) {
    lines.push(chalk.yellow(`  warning: ${warning}`));
  }
  for (const suggestion of report.suggestions) {
    lines.push(chalk.cyan(`  suggestion: ${suggestion}`));
  }

  return lines.join("\n");
}

export function formatReportJson(report: ValidationReport): string {
  return JSON.stringify(report, null, 2);
}

export function formatReport(report: ValidationReport, format: OutputFormat): string {
  return format === "json" ? formatReportJson(report) : formatReportTerminal(report);
}

/**
 * Format a generated test: path header, source, then the dependency hint
 */
export function formatGenerationTerminal(result: GenerationResult): string {
  const lines: string[] = [];

  lines.push(chalk.bold.underline(result.filePath));
  lines.push(chalk.gray("─".repeat(40)));
  lines.push(result.testClass);
  lines.push(chalk.gray("─".repeat(40)));
  lines.push(chalk.gray(`Test dependencies: ${result.dependencies.join(", ")}`));

  return lines.join("\n");
}

export function formatGenerationJson(result: GenerationResult): string {
  return JSON.stringify(result, null, 2);
}

export function formatGeneration(result: GenerationResult, format: OutputFormat): string {
  return format === "json" ? formatGenerationJson(result) : formatGenerationTerminal(result);
}

/**
 * Format an error for terminal output
 */
export function formatError(error: Error): string {
  return chalk.red(`Error: ${error.message}`);
}

export function formatWarning(message: string): string {
  return chalk.yellow(`Warning: ${message}`);
}

export function formatSuccess(message: string): string {
  return chalk.green(`✓ ${message}`);
}
