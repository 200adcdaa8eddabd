/**
 * Deps command - the dependency list the generator puts in its prompt
 */

import chalk from "chalk";

import { FileScratchpad, PROJECT_DEPENDENCIES_KEY, readProjectDependencies } from "../../state/index.js";
import { formatSuccess } from "../formatters.js";
import { fail, resolveProjectRoot } from "../shared.js";

import type { Command } from "commander";

async function openScratchpad(options: Record<string, unknown>): Promise<FileScratchpad> {
  const scratchpad = new FileScratchpad(resolveProjectRoot(options));
  const loaded = await scratchpad.load();
  if (!loaded.success) {
    fail(loaded.error);
  }
  return scratchpad;
}

export function registerDepsCommand(program: Command): void {
  const deps = program.command("deps").description("Manage known project dependencies");

  deps
    .command("add <coordinates...>")
    .description("Record dependency coordinates (group:artifact) for prompts")
    .option("--project-root <dir>", "Project root holding .testsmith state")
    .action(async (coordinates: string[], options: Record<string, unknown>) => {
      const scratchpad = await openScratchpad(options);

      const current = readProjectDependencies(scratchpad) ?? [];
      const merged = [...new Set([...current, ...coordinates])];
      scratchpad.set(PROJECT_DEPENDENCIES_KEY, merged);

      const saved = await scratchpad.save();
      if (!saved.success) {
        fail(saved.error);
      }
      console.log(formatSuccess(`${merged.length} known dependencies`));
    });

  deps
    .command("list")
    .description("List recorded dependency coordinates")
    .option("--project-root <dir>", "Project root holding .testsmith state")
    .action(async (options: Record<string, unknown>) => {
      const scratchpad = await openScratchpad(options);

      const current = readProjectDependencies(scratchpad) ?? [];
      if (current.length === 0) {
        console.log(chalk.gray("No dependencies recorded."));
        return;
      }
      for (const coordinate of current) {
        console.log(coordinate);
      }
    });
}
