import type { Logger, TaskLogger } from "./utils/logger";

export type TaskId = string;

export type Flags = readonly string[];

export type TaskContext = {
  id: TaskId;
  flags: Flags;
  logger: TaskLogger;
  sequence: (ids: readonly TaskId[]) => Promise<SequenceOutcome>;
  parallel: (ids: readonly TaskId[]) => Promise<ParallelOutcome>;
};

export type TaskStatus = number | void;

export type Runnable = (
  context: TaskContext
) => TaskStatus | Promise<TaskStatus>;

export type ExecutionResult = {
  id: TaskId;
  exitCode: number;
  elapsed: number;
};

export type MissingTask = {
  taskId: TaskId;
};

export type AggregateOutcome = "succeeded" | "partial-failure" | "all-failed";

export type SequenceOutcome =
  | { status: "succeeded"; exitCode: 0; results: ExecutionResult[] }
  | { status: "missing"; exitCode: number; taskId: TaskId }
  | {
      status: "failed";
      exitCode: number;
      taskId: TaskId;
      results: ExecutionResult[];
    };

export type ParallelOutcome =
  | { status: "missing"; exitCode: number; taskId: TaskId }
  | {
      status: AggregateOutcome;
      exitCode: number;
      failures: number;
      results: ExecutionResult[];
    };

export type RunnerConfig = Readonly<{
  tasks: readonly TaskId[];
  flags: Flags;
  defaultTask: TaskId;
}>;

export type ParsedArgs = {
  tasks: TaskId[];
  flags: string[];
};

export type LogLevel = "info" | "success" | "warn" | "error";

export type LoggerOptions = {
  quiet?: boolean;
  timestamps?: boolean;
  clock?: () => Date;
};

export type Clock = () => number;

export interface RunOptions extends LoggerOptions {
  defaultTask?: TaskId;
  logger?: Logger;
  now?: Clock;
}

export type Script = {
  name: string;
  command: string;
};

export type PackageTasks = {
  scripts: Script[];
  defaultTask?: TaskId;
};
