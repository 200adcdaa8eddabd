/**
 * Validate command - check saved model output without calling a model
 */

import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { resolve } from "path";

import { validateTest } from "../../validation/index.js";
import { formatReport, isValidOutputFormat } from "../formatters.js";
import { configureLogging, fail } from "../shared.js";

import type { Command } from "commander";

export function registerValidateCommand(program: Command): void {
  program
    .command("validate <file>")
    .description("Validate saved model output as a JUnit 5 test")
    .option("-c, --class <name>", "Class under test, for naming suggestions")
    .option("--no-strict", "Do not treat warnings as errors")
    .option("-o, --output <format>", "Output format: terminal, json", "terminal")
    .option("-v, --verbose", "Verbose output")
    .action(async (file: string, options: Record<string, unknown>) => {
      configureLogging(options);

      const outputFormat = String(options["output"] ?? "terminal");
      if (!isValidOutputFormat(outputFormat)) {
        fail(new Error(`Invalid output format: ${outputFormat}. Use: terminal, json`));
      }

      const filePath = resolve(file);
      if (!existsSync(filePath)) {
        fail(new Error(`File not found: ${filePath}`));
      }

      const rawOutput = await readFile(filePath, "utf-8");
      const report = validateTest(rawOutput, {
        strict: options["strict"] !== false,
        ...(typeof options["class"] === "string" ? { targetClassName: options["class"] } : {}),
      });

      console.log(formatReport(report, outputFormat));
      if (!report.valid) {
        process.exit(1);
      }
    });
}
