import debug from "debug";
import type { TaskRegistry } from "../core/registry";
import {
  EXIT_ALL_FAILED,
  EXIT_MISSING_TASK,
  EXIT_PARTIAL_FAILURE,
  EXIT_SUCCESS,
} from "../exit-codes";
import type {
  AggregateOutcome,
  Flags,
  ParallelOutcome,
  TaskId,
} from "../types";
import type { Logger } from "../utils/logger";
import type { Invoker } from "./invoker";

const log = debug("runnel:parallelizer");

const exitCodes: Record<AggregateOutcome, number> = {
  "all-failed": EXIT_ALL_FAILED,
  "partial-failure": EXIT_PARTIAL_FAILURE,
  succeeded: EXIT_SUCCESS,
};

export function classify(failures: number, total: number): AggregateOutcome {
  if (failures === 0) {
    return "succeeded";
  }
  return failures < total ? "partial-failure" : "all-failed";
}

export class Parallelizer {
  private readonly registry: TaskRegistry;
  private readonly invoker: Invoker;
  private readonly logger: Logger;

  constructor(registry: TaskRegistry, invoker: Invoker, logger: Logger) {
    this.registry = registry;
    this.invoker = invoker;
    this.logger = logger;
  }

  /**
   * Starts every task at once and waits for all of them, failed or not.
   * Nothing is launched when any of the ids is not registered.
   */
  async run(ids: readonly TaskId[], flags: Flags): Promise<ParallelOutcome> {
    const missing = this.registry.isDefinedVerbose(ids, this.logger);
    if (missing) {
      return {
        exitCode: EXIT_MISSING_TASK,
        status: "missing",
        taskId: missing.taskId,
      };
    }

    log(`Running ${ids.length} tasks in parallel:`, ids);
    // Invocations never reject once ids are known to be registered
    const results = await Promise.all(
      ids.map((id) => this.invoker.run(id, flags))
    );

    const failures = results.filter((r) => r.exitCode !== EXIT_SUCCESS).length;
    const status = classify(failures, results.length);
    log(`Parallel batch ${status}: ${failures}/${results.length} failed`);

    return { exitCode: exitCodes[status], failures, results, status };
  }
}
