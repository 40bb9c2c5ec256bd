import type { RunnerConfig, TaskId } from "../types";
import { parseArgs } from "./parser";

export const DEFAULT_TASK: TaskId = "default";

/**
 * Builds the configuration for one bootstrap from raw CLI arguments.
 * The result and its arrays are frozen.
 */
export function createConfig(
  args: readonly string[],
  defaultTask: TaskId = DEFAULT_TASK
): RunnerConfig {
  const { tasks, flags } = parseArgs(args);
  return Object.freeze({
    defaultTask,
    flags: Object.freeze(flags),
    tasks: Object.freeze(tasks),
  });
}
