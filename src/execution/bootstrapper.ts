import debug from "debug";
import type { TaskRegistry } from "../core/registry";
import { EXIT_SUCCESS } from "../exit-codes";
import type { RunnerConfig } from "../types";
import type { Logger } from "../utils/logger";
import type { Invoker } from "./invoker";
import type { Sequencer } from "./sequencer";

const log = debug("runnel:bootstrap");

export type BootstrapState = "idle" | "resolving" | "running" | "done";

export class Bootstrapper {
  private readonly registry: TaskRegistry;
  private readonly sequencer: Sequencer;
  private readonly invoker: Invoker;
  private readonly logger: Logger;
  private current: BootstrapState = "idle";
  private started?: Promise<number>;

  constructor(
    registry: TaskRegistry,
    sequencer: Sequencer,
    invoker: Invoker,
    logger: Logger
  ) {
    this.registry = registry;
    this.sequencer = sequencer;
    this.invoker = invoker;
    this.logger = logger;
  }

  get state(): BootstrapState {
    return this.current;
  }

  /**
   * Picks what to run and returns the process exit code. Only the first
   * call runs anything; later calls resolve to the same exit code.
   */
  bootstrap(config: RunnerConfig): Promise<number> {
    if (this.started) {
      log("Already bootstrapped, ignoring");
      return this.started;
    }
    this.started = this.start(config);
    return this.started;
  }

  private async start(config: RunnerConfig): Promise<number> {
    this.current = "resolving";
    try {
      if (config.tasks.length > 0) {
        log("Running tasks from arguments:", config.tasks);
        this.current = "running";
        const outcome = await this.sequencer.run(config.tasks, config.flags);
        return outcome.exitCode;
      }

      if (this.registry.isDefined(config.defaultTask)) {
        log(`Running default task ${config.defaultTask}`);
        this.current = "running";
        const result = await this.invoker.run(config.defaultTask, config.flags);
        return result.exitCode;
      }

      this.logger.info("Nothing to run.");
      this.showTasks();
      return EXIT_SUCCESS;
    } finally {
      this.current = "done";
    }
  }

  showTasks(): void {
    this.logger.info("Available tasks:");
    const tasks = this.registry.listTasks();
    if (tasks.length === 0) {
      this.logger.info(`  ${this.logger.colorMuted("<none>")}`);
      return;
    }
    for (const task of tasks) {
      this.logger.info(`  ${this.logger.colorTask(task)}`);
    }
  }
}
