export class RunnelError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnknownTaskError extends RunnelError {
  readonly taskId: string;

  constructor(taskId: string) {
    super(`Task '${taskId}' is not defined`);
    this.taskId = taskId;
  }
}

export class DuplicateTaskError extends RunnelError {
  readonly taskId: string;

  constructor(taskId: string) {
    super(`Task '${taskId}' is already registered`);
    this.taskId = taskId;
  }
}

export class InvalidTaskIdError extends RunnelError {
  readonly taskId: string;

  constructor(taskId: string) {
    super(
      taskId === ""
        ? "Task id must not be empty"
        : `Task id '${taskId}' must not start with '-'`
    );
    this.taskId = taskId;
  }
}

export class PackageLoadError extends RunnelError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(reason);
    this.path = path;
  }
}
