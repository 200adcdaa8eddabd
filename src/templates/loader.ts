/**
 * Prompt template loading
 *
 * Templates live as YAML files under src/templates/prompts and are
 * validated against PromptTemplateSchema on load.
 */

import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { dirname, resolve } from "path";
import { fileURLToPath } from "url";

import YAML from "yaml";

import { ValidationError } from "../lib/errors.js";
import { err, ok, tryCatchAsync } from "../lib/result.js";

import { PromptTemplateSchema } from "./schema.js";

import type { Result } from "../lib/result.js";
import type { PromptTemplate } from "./schema.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Template used for JUnit 5 test generation
 */
export const DEFAULT_PROMPT_TEMPLATE_ID = "junit5-unit-test";

/**
 * Locate the bundled prompts directory.
 * Tries the source layout first, then the locations seen from dist/.
 */
export function getPromptsPath(): string {
  const candidates = [
    resolve(__dirname, "prompts"),
    resolve(__dirname, "../src/templates/prompts"),
    resolve(__dirname, "../../src/templates/prompts"),
    resolve(process.cwd(), "src/templates/prompts"),
  ];

  for (const candidate of candidates) {
    if (existsSync(candidate)) {
      return candidate;
    }
  }

  return candidates[0] ?? "prompts";
}

/**
 * Parse and validate a template from YAML text
 */
export function parsePromptTemplate(
  content: string,
  source = "<inline>"
): Result<PromptTemplate, ValidationError> {
  let parsed: unknown;
  try {
    parsed = YAML.parse(content) as unknown;
  } catch (error) {
    return err(
      new ValidationError(`Invalid YAML in prompt template ${source}`, {
        source,
        cause: error instanceof Error ? error.message : String(error),
      })
    );
  }

  const validation = PromptTemplateSchema.safeParse(parsed);
  if (!validation.success) {
    return err(
      new ValidationError(`Invalid prompt template in ${source}`, {
        source,
        issues: validation.error.issues,
      })
    );
  }

  return ok(validation.data);
}

/**
 * Load `<id>.yml` from the prompts directory
 */
export async function loadPromptTemplate(
  id: string = DEFAULT_PROMPT_TEMPLATE_ID,
  promptsDir: string = getPromptsPath()
): Promise<Result<PromptTemplate, ValidationError>> {
  const filePath = resolve(promptsDir, `${id}.yml`);

  const read = await tryCatchAsync(() => readFile(filePath, "utf-8"));
  if (!read.success) {
    return err(
      new ValidationError(`Failed to read prompt template: ${filePath}`, {
        filePath,
        cause: read.error.message,
      })
    );
  }

  const template = parsePromptTemplate(read.data, filePath);
  if (template.success && template.data.id !== id) {
    return err(
      new ValidationError(`Prompt template id '${template.data.id}' does not match file name '${id}'`, {
        filePath,
      })
    );
  }

  return template;
}
