/**
 * Configuration Management
 *
 * Persistent user configuration (API keys, provider, generation defaults).
 * Lives in `$TESTSMITH_HOME` or `~/.testsmith`, written with owner-only permissions.
 */

import { chmodSync, existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";

import { z } from "zod";

import { ConfigError } from "../lib/errors.js";
import { err, ok } from "../lib/result.js";

import type { Result } from "../lib/result.js";

export type KeyedProvider = "anthropic" | "openai";

/**
 * Configuration schema
 */
export const ConfigSchema = z.object({
  anthropicApiKey: z.string().optional(),
  openaiApiKey: z.string().optional(),
  defaultProvider: z.enum(["anthropic", "openai", "mock"]).optional(),
  model: z.string().min(1).optional(),
  strict: z.boolean().optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

export const CONFIG_KEYS = ConfigSchema.keyof().options;

export function getConfigDir(): string {
  const override = process.env["TESTSMITH_HOME"];
  return override !== undefined && override.length > 0 ? override : join(homedir(), ".testsmith");
}

/**
 * Get config file path (for display purposes)
 */
export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

function ensureConfigDir(): void {
  const dir = getConfigDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
}

/**
 * Load configuration from disk. A missing file is an empty config;
 * an unreadable or invalid one is a ConfigError.
 */
export function loadConfig(): Result<Config, ConfigError> {
  const configPath = getConfigPath();
  if (!existsSync(configPath)) {
    return ok({});
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf-8")) as unknown;
  } catch (error) {
    return err(
      new ConfigError(`Failed to read config: ${configPath}`, {
        cause: error instanceof Error ? error.message : String(error),
      })
    );
  }

  const result = ConfigSchema.safeParse(parsed);
  if (!result.success) {
    return err(new ConfigError(`Invalid config in ${configPath}`, { issues: result.error.issues }));
  }
  return ok(result.data);
}

/**
 * Save configuration to disk with secure permissions
 */
export function saveConfig(config: Config): void {
  ensureConfigDir();
  const configPath = getConfigPath();
  writeFileSync(configPath, JSON.stringify(config, null, 2), { mode: 0o600 });
  chmodSync(configPath, 0o600);
}

function loadConfigOrThrow(): Config {
  const loaded = loadConfig();
  if (!loaded.success) {
    throw loaded.error;
  }
  return loaded.data;
}

export function setConfigValue<K extends keyof Config>(key: K, value: Config[K]): void {
  const config = loadConfigOrThrow();
  config[key] = value;
  saveConfig(config);
}

export function getConfigValue<K extends keyof Config>(key: K): Config[K] {
  return loadConfigOrThrow()[key];
}

export function deleteConfigValue(key: keyof Config): void {
  const config = loadConfigOrThrow();
  delete config[key];
  saveConfig(config);
}

/**
 * Parse a `config set` value from the command line into its typed form
 */
export function parseConfigValue(key: string, raw: string): Result<Partial<Config>, ConfigError> {
  let value: unknown = raw;
  if (key === "strict") {
    value = raw === "true" ? true : raw === "false" ? false : raw;
  } else if (key === "timeoutMs") {
    value = Number(raw);
  }

  const result = ConfigSchema.strict().safeParse({ [key]: value });
  if (!result.success) {
    const message = result.error.issues.map((issue) => issue.message).join("; ");
    return err(new ConfigError(`Invalid value for '${key}': ${message}`, { key, raw }));
  }
  return ok(result.data);
}

/**
 * Get API key (from environment or config file).
 * Environment variables take precedence.
 */
export function getApiKey(provider: KeyedProvider): string | undefined {
  const envVar = provider === "anthropic" ? "ANTHROPIC_API_KEY" : "OPENAI_API_KEY";
  const envValue = process.env[envVar];
  if (envValue !== undefined && envValue.length > 0) {
    return envValue;
  }

  const config = loadConfig();
  if (!config.success) {
    return undefined;
  }
  return provider === "anthropic" ? config.data.anthropicApiKey : config.data.openaiApiKey;
}

/**
 * Get configured provider (or default)
 */
export function getDefaultProvider(): "anthropic" | "openai" | "mock" {
  const config = loadConfig();
  return (config.success ? config.data.defaultProvider : undefined) ?? "anthropic";
}

/**
 * Mask API key for display (show first/last 4 chars)
 */
export function maskApiKey(key: string): string {
  if (key.length <= 12) {
    return "****";
  }
  return `${key.slice(0, 4)}...${key.slice(-4)}`;
}

/**
 * Validate API key format
 */
export function validateApiKey(provider: KeyedProvider, key: string): { valid: boolean; error?: string } {
  if (key.length === 0) {
    return { valid: false, error: "API key cannot be empty" };
  }

  if (provider === "anthropic" && !key.startsWith("sk-ant-")) {
    return { valid: false, error: "Anthropic API keys should start with 'sk-ant-'" };
  }

  if (provider === "openai" && !key.startsWith("sk-")) {
    return { valid: false, error: "OpenAI API keys should start with 'sk-'" };
  }

  return { valid: true };
}
