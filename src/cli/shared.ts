/**
 * Shared CLI utilities
 */

import { resolve } from "path";

import { logger } from "../lib/index.js";

import { loadConfig, type Config } from "./config.js";
import { formatError } from "./formatters.js";

import type { AIProvider } from "../ai/index.js";

export const PROVIDERS: readonly AIProvider[] = ["anthropic", "openai", "mock"];

export function isProvider(value: string): value is AIProvider {
  return PROVIDERS.some((known) => known === value);
}

/**
 * Print the error and exit with status 1
 */
export function fail(error: unknown): never {
  console.error(formatError(error instanceof Error ? error : new Error(String(error))));
  process.exit(1);
}

export function configureLogging(options: Record<string, unknown>): void {
  if (options["quiet"]) {
    logger.configure({ level: "error" });
  } else if (options["verbose"]) {
    logger.configure({ level: "debug" });
  }
}

export function loadConfigOrExit(): Config {
  const loaded = loadConfig();
  if (!loaded.success) {
    fail(loaded.error);
  }
  return loaded.data;
}

/**
 * `--project-root`, or the working directory
 */
export function resolveProjectRoot(options: Record<string, unknown>): string {
  const root = options["projectRoot"];
  return resolve(typeof root === "string" ? root : process.cwd());
}
