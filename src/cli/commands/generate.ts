/**
 * Generate command - one JUnit 5 test class per Java source file
 *
 * Reads the source, asks the configured provider for a test, validates the
 * reply and prints it (or writes it with --write). Project state lives in
 * `<project-root>/.testsmith/scratchpad.json`.
 */

import { existsSync } from "fs";
import { mkdir, readFile, writeFile } from "fs/promises";
import { basename, dirname, extname, resolve } from "path";

import chalk from "chalk";
import ora from "ora";

import { createAIService, createModelCaller } from "../../ai/index.js";
import { GenerationValidationError } from "../../lib/errors.js";
import { FileScratchpad } from "../../state/index.js";
import { TestGenerator } from "../../testgen/index.js";
import { getApiKey, getDefaultProvider } from "../config.js";
import { formatGeneration, formatSuccess, formatWarning, isValidOutputFormat } from "../formatters.js";
import {
  PROVIDERS,
  configureLogging,
  fail,
  isProvider,
  loadConfigOrExit,
  resolveProjectRoot,
} from "../shared.js";

import type { Command } from "commander";

export function registerGenerateCommand(program: Command): void {
  program
    .command("generate <sourceFile>")
    .description("Generate a JUnit 5 test class for a Java source file")
    .option("-c, --class <name>", "Class under test (defaults to the file name)")
    .option("-m, --method <signature>", "Focus on one method")
    .option("-f, --framework <tag>", "Test framework tag", "junit5")
    .option("-p, --provider <provider>", "AI provider: anthropic, openai, mock")
    .option("--model <model>", "Model identifier")
    .option("--no-strict", "Accept replies that only have warnings")
    .option("--project-root <dir>", "Project root holding .testsmith state")
    .option("--write", "Write the test file (default is dry-run)")
    .option("--output-dir <dir>", "Base directory for --write (defaults to the project root)")
    .option("-o, --output <format>", "Output format: terminal, json", "terminal")
    .option("-v, --verbose", "Verbose output")
    .option("-q, --quiet", "Quiet mode (errors only)")
    .action(async (sourceFile: string, options: Record<string, unknown>) => {
      configureLogging(options);

      const outputFormat = String(options["output"] ?? "terminal");
      if (!isValidOutputFormat(outputFormat)) {
        fail(new Error(`Invalid output format: ${outputFormat}. Use: terminal, json`));
      }

      const sourcePath = resolve(sourceFile);
      if (!existsSync(sourcePath)) {
        fail(new Error(`File not found: ${sourcePath}`));
      }

      const config = loadConfigOrExit();
      const provider = String(options["provider"] ?? getDefaultProvider());
      if (!isProvider(provider)) {
        fail(new Error(`Invalid provider: ${provider}. Use: ${PROVIDERS.join(", ")}`));
      }

      const service = createAIService({
        provider,
        ...(provider !== "mock" ? { apiKey: getApiKey(provider) ?? "" } : {}),
        ...(config.timeoutMs !== undefined ? { timeoutMs: config.timeoutMs } : {}),
      });
      if (!service.isConfigured()) {
        fail(new Error(`No API key for ${provider}. Run \`testsmith config set-key ${provider} <key>\`.`));
      }

      const projectRoot = resolveProjectRoot(options);
      const scratchpad = new FileScratchpad(projectRoot);
      const loaded = await scratchpad.load();
      if (!loaded.success) {
        fail(loaded.error);
      }

      const className =
        typeof options["class"] === "string" ? options["class"] : basename(sourcePath, extname(sourcePath));
      const strict = options["strict"] === false ? false : config.strict ?? true;
      const model = typeof options["model"] === "string" ? options["model"] : config.model ?? service.getModel();

      const generator = new TestGenerator({
        callModel: createModelCaller(service),
        model,
        strict,
      });

      const showSpinner = outputFormat === "terminal" && !options["quiet"];
      const spinner = showSpinner ? ora(`Generating test for ${className}...`).start() : null;

      try {
        const sourceCode = await readFile(sourcePath, "utf-8");
        const result = await generator.generate(
          { scratchpad },
          {
            className,
            sourceCode,
            framework: String(options["framework"] ?? "junit5"),
            ...(typeof options["method"] === "string" ? { methodSignature: options["method"] } : {}),
          }
        );

        if (!result.success) {
          spinner?.fail(`Generation failed for ${className}`);
          if (result.error instanceof GenerationValidationError) {
            for (const issue of result.error.issues) {
              console.error(chalk.red(`  - ${issue}`));
            }
            process.exit(1);
          }
          fail(result.error);
        }

        spinner?.succeed(`Generated ${result.data.filePath}`);

        const saved = await scratchpad.save();
        if (!saved.success) {
          console.error(formatWarning(saved.error.message));
        }

        if (options["write"]) {
          const baseDir = resolve(typeof options["outputDir"] === "string" ? options["outputDir"] : projectRoot);
          const target = resolve(baseDir, result.data.filePath);
          await mkdir(dirname(target), { recursive: true });
          await writeFile(target, `${result.data.testClass}\n`, "utf-8");
          if (outputFormat === "terminal") {
            console.log(formatSuccess(`Wrote ${target}`));
            return;
          }
        }

        console.log(formatGeneration(result.data, outputFormat));
      } catch (error) {
        spinner?.fail("Generation failed");
        fail(error);
      }
    });
}
