/**
 * Scratch state shared between the calling agent and the generator
 *
 * The generator reads known dependencies from it and records the last
 * generated test. The agent owns the storage; testsmith only reads and
 * writes keys.
 */

import { existsSync } from "fs";
import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname, resolve } from "path";

import { z } from "zod";

import { TestsmithError } from "../lib/errors.js";
import { err, ok } from "../lib/result.js";

import type { Result } from "../lib/result.js";

/** Slot holding the dependency coordinates already on the classpath */
export const PROJECT_DEPENDENCIES_KEY = "project_dependencies";

/** Slot written after every successful generation */
export const LAST_GENERATED_TEST_KEY = "last_generated_test";

const STATE_DIR = ".testsmith";
const STATE_FILE = "scratchpad.json";

export interface Scratchpad {
  get(key: string): unknown;
  set(key: string, value: unknown): void;
}

/**
 * What the generator needs from the calling agent
 */
export interface AgentState {
  scratchpad: Scratchpad;
}

/**
 * Record stored under {@link LAST_GENERATED_TEST_KEY}
 */
export interface LastGeneratedTest {
  className: string;
  testCode: string;
  filePath: string;
}

export class MemoryScratchpad implements Scratchpad {
  private readonly entries: Map<string, unknown>;

  constructor(initial: Record<string, unknown> = {}) {
    this.entries = new Map(Object.entries(initial));
  }

  get(key: string): unknown {
    return this.entries.get(key);
  }

  set(key: string, value: unknown): void {
    this.entries.set(key, value);
  }

  toJSON(): Record<string, unknown> {
    return Object.fromEntries(this.entries);
  }
}

const ScratchpadFileSchema = z.object({
  version: z.literal(1),
  entries: z.record(z.unknown()),
});

/**
 * Scratchpad persisted as JSON under `<projectRoot>/.testsmith/`.
 *
 * Reads and writes go to memory; `load()` and `save()` move the whole
 * map to and from disk.
 */
export class FileScratchpad extends MemoryScratchpad {
  readonly filePath: string;

  constructor(projectRoot: string) {
    super();
    this.filePath = resolve(projectRoot, STATE_DIR, STATE_FILE);
  }

  /**
   * Merge the file's entries into memory. A missing file is an empty state.
   */
  async load(): Promise<Result<number, TestsmithError>> {
    if (!existsSync(this.filePath)) {
      return ok(0);
    }

    try {
      const content = await readFile(this.filePath, "utf-8");
      const parsed = ScratchpadFileSchema.safeParse(JSON.parse(content) as unknown);
      if (!parsed.success) {
        return err(
          new TestsmithError(`Invalid scratchpad file: ${this.filePath}`, "STATE_INVALID", {
            issues: parsed.error.issues,
          })
        );
      }

      const entries = Object.entries(parsed.data.entries);
      for (const [key, value] of entries) {
        this.set(key, value);
      }
      return ok(entries.length);
    } catch (error) {
      return err(
        new TestsmithError(
          `Failed to load scratchpad: ${error instanceof Error ? error.message : String(error)}`,
          "STATE_ERROR"
        )
      );
    }
  }

  async save(): Promise<Result<void, TestsmithError>> {
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      const content = JSON.stringify({ version: 1, entries: this.toJSON() }, null, 2);
      await writeFile(this.filePath, content, "utf-8");
      return ok(undefined);
    } catch (error) {
      return err(
        new TestsmithError(
          `Failed to save scratchpad: ${error instanceof Error ? error.message : String(error)}`,
          "STATE_ERROR"
        )
      );
    }
  }
}

const DependencyListSchema = z.array(z.string());

/**
 * Dependencies recorded by the agent, or `undefined` when the slot is
 * empty or holds something other than a string list
 */
export function readProjectDependencies(scratchpad: Scratchpad): string[] | undefined {
  const parsed = DependencyListSchema.safeParse(scratchpad.get(PROJECT_DEPENDENCIES_KEY));
  return parsed.success ? parsed.data : undefined;
}
