#!/usr/bin/env node

import ansis from "ansis";
import { DEFAULT_TASK } from "./core/config";
import { loadPackageTasks } from "./core/package-tasks";
import { RegistryBuilder } from "./core/registry";
import { PackageLoadError } from "./errors";
import { EXIT_GENERAL_ERROR } from "./exit-codes";
import { command } from "./execution/command";
import { Runner } from "./execution/runner";
import type { PackageTasks } from "./types";

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const cwd = process.cwd();

  let packageTasks: PackageTasks;
  try {
    packageTasks = loadPackageTasks(cwd);
  } catch (error) {
    if (error instanceof PackageLoadError) {
      console.error(ansis.red(`Error: ${error.message}`));
      return EXIT_GENERAL_ERROR;
    }
    throw error;
  }

  const builder = new RegistryBuilder();
  for (const script of packageTasks.scripts) {
    builder.task(script.name, command(script.command, { cwd }));
  }

  const runner = new Runner({
    defaultTask: packageTasks.defaultTask ?? DEFAULT_TASK,
    registry: builder.build(),
  });
  return runner.main(args);
}

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error(ansis.red("Fatal error:"), error);
    process.exit(EXIT_GENERAL_ERROR);
  });
