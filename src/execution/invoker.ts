import debug from "debug";
import type { TaskRegistry } from "../core/registry";
import {
  EXIT_GENERAL_ERROR,
  EXIT_SUCCESS,
  MAX_EXIT_CODE,
} from "../exit-codes";
import type {
  Clock,
  ExecutionResult,
  Flags,
  Runnable,
  TaskContext,
  TaskId,
  TaskStatus,
} from "../types";
import { prettyMs } from "../utils/format";
import type { Logger } from "../utils/logger";

const log = debug("runnel:invoker");

export type ContextFactory = (id: TaskId, flags: Flags) => TaskContext;

export type InvokerOptions = {
  registry: TaskRegistry;
  logger: Logger;
  createContext: ContextFactory;
  now?: Clock;
};

export class Invoker {
  private readonly registry: TaskRegistry;
  private readonly logger: Logger;
  private readonly createContext: ContextFactory;
  private readonly now: Clock;

  constructor(options: InvokerOptions) {
    this.registry = options.registry;
    this.logger = options.logger;
    this.createContext = options.createContext;
    this.now = options.now ?? Date.now;
  }

  /**
   * Runs one task and reports its status. A non-zero status is returned,
   * not thrown; only an unregistered id throws (UnknownTaskError).
   */
  async run(id: TaskId, flags: Flags): Promise<ExecutionResult> {
    const runnable = this.registry.get(id);
    const coloredId = this.logger.colorTask(id);

    this.logger.info(`Starting '${coloredId}'...`);
    const start = this.now();
    const exitCode = await this.execute(id, runnable, flags);
    const end = this.now();

    // Clocks with coarse resolution may report end < start
    const elapsed = Math.max(0, Math.round(end - start));
    const duration = prettyMs(elapsed);
    log(`Task ${id} exited with ${exitCode} after ${elapsed}ms`);

    if (exitCode === EXIT_SUCCESS) {
      this.logger.success(
        `Finished '${coloredId}' after ${this.logger.colorDuration(duration)}`
      );
    } else {
      this.logger.error(`Task '${id}' failed after ${duration} (${exitCode})`);
    }

    return { elapsed, exitCode, id };
  }

  private async execute(
    id: TaskId,
    runnable: Runnable,
    flags: Flags
  ): Promise<number> {
    try {
      const status = await runnable(this.createContext(id, flags));
      return this.toExitCode(id, status);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log(`Task ${id} threw:`, error);
      this.logger.error(`Task '${id}' threw: ${message}`);
      return EXIT_GENERAL_ERROR;
    }
  }

  private toExitCode(id: TaskId, status: TaskStatus): number {
    if (typeof status !== "number") {
      return EXIT_SUCCESS;
    }
    if (!Number.isInteger(status)) {
      this.logger.warn(`Task '${id}' returned a non-integer status: ${status}`);
      return EXIT_GENERAL_ERROR;
    }
    // The process keeps only the low byte, so 256 would exit with 0
    if (status < EXIT_SUCCESS || status > MAX_EXIT_CODE) {
      this.logger.warn(
        `Task '${id}' returned a status outside 0-${MAX_EXIT_CODE}: ${status}`
      );
      return EXIT_GENERAL_ERROR;
    }
    return status;
  }
}
