export { Runner, createRunner } from "./execution/runner";
export { Invoker } from "./execution/invoker";
export { Sequencer } from "./execution/sequencer";
export { Parallelizer, classify } from "./execution/parallelizer";
export { Bootstrapper } from "./execution/bootstrapper";
export { command, buildCommandLine } from "./execution/command";
export { TaskRegistry, RegistryBuilder } from "./core/registry";
export { Parser, parseArgs } from "./core/parser";
export { createConfig, DEFAULT_TASK } from "./core/config";
export { loadPackageTasks } from "./core/package-tasks";
export { Logger, TaskLogger } from "./utils/logger";
export { prettyMs } from "./utils/format";
export * from "./errors";
export * from "./exit-codes";

export type { RunnerOptions } from "./execution/runner";
export type { ContextFactory, InvokerOptions } from "./execution/invoker";
export type { BootstrapState } from "./execution/bootstrapper";
export type { CommandOptions } from "./execution/command";
export type {
  AggregateOutcome,
  Clock,
  ExecutionResult,
  Flags,
  LoggerOptions,
  LogLevel,
  MissingTask,
  PackageTasks,
  ParallelOutcome,
  ParsedArgs,
  Runnable,
  RunnerConfig,
  RunOptions,
  Script,
  SequenceOutcome,
  TaskContext,
  TaskId,
  TaskStatus,
} from "./types";
