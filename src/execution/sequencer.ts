import debug from "debug";
import type { TaskRegistry } from "../core/registry";
import { EXIT_MISSING_TASK, EXIT_SUCCESS } from "../exit-codes";
import type { ExecutionResult, Flags, SequenceOutcome, TaskId } from "../types";
import type { Logger } from "../utils/logger";
import type { Invoker } from "./invoker";

const log = debug("runnel:sequencer");

export class Sequencer {
  private readonly registry: TaskRegistry;
  private readonly invoker: Invoker;
  private readonly logger: Logger;

  constructor(registry: TaskRegistry, invoker: Invoker, logger: Logger) {
    this.registry = registry;
    this.invoker = invoker;
    this.logger = logger;
  }

  /**
   * Runs tasks one after another and stops at the first non-zero status.
   * Nothing runs when any of the ids is not registered.
   */
  async run(ids: readonly TaskId[], flags: Flags): Promise<SequenceOutcome> {
    const missing = this.registry.isDefinedVerbose(ids, this.logger);
    if (missing) {
      return {
        exitCode: EXIT_MISSING_TASK,
        status: "missing",
        taskId: missing.taskId,
      };
    }

    log("Running sequence:", ids);
    const results: ExecutionResult[] = [];
    for (const id of ids) {
      const result = await this.invoker.run(id, flags);
      results.push(result);
      if (result.exitCode !== EXIT_SUCCESS) {
        log(`Sequence stopped at ${id}`);
        return {
          exitCode: result.exitCode,
          results,
          status: "failed",
          taskId: id,
        };
      }
    }

    return { exitCode: EXIT_SUCCESS, results, status: "succeeded" };
  }
}
