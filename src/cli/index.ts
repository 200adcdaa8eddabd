#!/usr/bin/env node
/**
 * testsmith CLI entry point
 *
 * Commands:
 * - generate - Generate a JUnit 5 test for a Java source file
 * - validate - Validate saved model output as a JUnit 5 test
 * - deps     - Manage the project dependencies the generator is told about
 * - config   - Manage API keys and generation defaults
 */

import chalk from "chalk";
import { Command } from "commander";

import { VERSION } from "../index.js";

import { registerDepsCommand } from "./commands/deps.js";
import { registerGenerateCommand } from "./commands/generate.js";
import { registerValidateCommand } from "./commands/validate.js";
import {
  CONFIG_KEYS,
  deleteConfigValue,
  getConfigPath,
  maskApiKey,
  parseConfigValue,
  saveConfig,
  validateApiKey,
} from "./config.js";
import { formatSuccess } from "./formatters.js";
import { fail, loadConfigOrExit } from "./shared.js";

const program = new Command();

program
  .name("testsmith")
  .description("Generate and validate JUnit 5 unit tests with a language model")
  .version(VERSION);

registerGenerateCommand(program);
registerValidateCommand(program);
registerDepsCommand(program);

const configCommand = program.command("config").description("Manage API keys and generation defaults");

configCommand
  .command("set-key <provider> <key>")
  .description("Store an API key for anthropic or openai")
  .action((provider: string, key: string) => {
    if (provider !== "anthropic" && provider !== "openai") {
      fail(new Error(`Invalid provider: ${provider}. Use: anthropic, openai`));
    }

    const check = validateApiKey(provider, key);
    if (!check.valid) {
      fail(new Error(check.error ?? "Invalid API key"));
    }

    const config = loadConfigOrExit();
    saveConfig({
      ...config,
      ...(provider === "anthropic" ? { anthropicApiKey: key } : { openaiApiKey: key }),
    });
    console.log(formatSuccess(`Stored ${provider} key ${maskApiKey(key)} in ${getConfigPath()}`));
  });

configCommand
  .command("set <key> <value>")
  .description(`Set a config value (${CONFIG_KEYS.join(", ")})`)
  .action((key: string, value: string) => {
    const parsed = parseConfigValue(key, value);
    if (!parsed.success) {
      fail(parsed.error);
    }
    saveConfig({ ...loadConfigOrExit(), ...parsed.data });
    console.log(formatSuccess(`Set ${key}`));
  });

configCommand
  .command("unset <key>")
  .description("Remove a config value")
  .action((key: string) => {
    const known = CONFIG_KEYS.find((k) => k === key);
    if (known === undefined) {
      fail(new Error(`Unknown config key: ${key}. Use: ${CONFIG_KEYS.join(", ")}`));
    }
    try {
      deleteConfigValue(known);
    } catch (error) {
      fail(error);
    }
    console.log(formatSuccess(`Removed ${key}`));
  });

configCommand
  .command("show")
  .description("Show the current configuration (keys masked)")
  .action(() => {
    const config = loadConfigOrExit();
    console.log(chalk.bold(getConfigPath()));
    for (const key of CONFIG_KEYS) {
      const value = config[key];
      if (value === undefined) {
        console.log(chalk.gray(`  ${key}: (unset)`));
      } else if (key === "anthropicApiKey" || key === "openaiApiKey") {
        console.log(`  ${key}: ${maskApiKey(String(value))}`);
      } else {
        console.log(`  ${key}: ${String(value)}`);
      }
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  fail(error);
});
