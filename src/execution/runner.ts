import { createConfig, DEFAULT_TASK } from "../core/config";
import { TaskRegistry } from "../core/registry";
import type {
  ExecutionResult,
  Flags,
  ParallelOutcome,
  Runnable,
  RunnerConfig,
  RunOptions,
  SequenceOutcome,
  TaskContext,
  TaskId,
} from "../types";
import { Logger } from "../utils/logger";
import { Bootstrapper } from "./bootstrapper";
import { Invoker } from "./invoker";
import { Parallelizer } from "./parallelizer";
import { Sequencer } from "./sequencer";

export interface RunnerOptions extends RunOptions {
  registry: TaskRegistry;
}

export class Runner {
  readonly registry: TaskRegistry;
  readonly logger: Logger;
  private readonly defaultTask: TaskId;
  private readonly invoker: Invoker;
  private readonly sequencer: Sequencer;
  private readonly parallelizer: Parallelizer;
  private readonly bootstrapper: Bootstrapper;

  constructor(options: RunnerOptions) {
    const { registry, defaultTask, logger, now, ...loggerOptions } = options;
    this.registry = registry;
    this.defaultTask = defaultTask ?? DEFAULT_TASK;
    this.logger = logger ?? new Logger(loggerOptions);

    this.invoker = new Invoker({
      createContext: (id, flags) => this.createContext(id, flags),
      logger: this.logger,
      now,
      registry,
    });
    this.sequencer = new Sequencer(registry, this.invoker, this.logger);
    this.parallelizer = new Parallelizer(registry, this.invoker, this.logger);
    this.bootstrapper = new Bootstrapper(
      registry,
      this.sequencer,
      this.invoker,
      this.logger
    );
  }

  listTasks(): readonly TaskId[] {
    return this.registry.listTasks();
  }

  invoke(id: TaskId, flags: Flags = []): Promise<ExecutionResult> {
    return this.invoker.run(id, flags);
  }

  sequence(
    ids: readonly TaskId[],
    flags: Flags = []
  ): Promise<SequenceOutcome> {
    return this.sequencer.run(ids, flags);
  }

  parallel(
    ids: readonly TaskId[],
    flags: Flags = []
  ): Promise<ParallelOutcome> {
    return this.parallelizer.run(ids, flags);
  }

  bootstrap(config: RunnerConfig): Promise<number> {
    return this.bootstrapper.bootstrap(config);
  }

  /**
   * Entry point for a task script: `process.exitCode = await runner.main(argv)`
   */
  main(args: readonly string[]): Promise<number> {
    return this.bootstrap(createConfig(args, this.defaultTask));
  }

  private createContext(id: TaskId, flags: Flags): TaskContext {
    return {
      flags,
      id,
      logger: this.logger.createTaskLogger(id),
      parallel: (ids) => this.parallelizer.run(ids, flags),
      sequence: (ids) => this.sequencer.run(ids, flags),
    };
  }
}

export function createRunner(
  tasks: Record<TaskId, Runnable>,
  options: RunOptions = {}
): Runner {
  return new Runner({ ...options, registry: TaskRegistry.from(tasks) });
}
