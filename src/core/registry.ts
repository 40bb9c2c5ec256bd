import debug from "debug";
import {
  DuplicateTaskError,
  InvalidTaskIdError,
  UnknownTaskError,
} from "../errors";
import type { MissingTask, Runnable, TaskId } from "../types";
import type { Logger } from "../utils/logger";

const log = debug("runnel:registry");

export class TaskRegistry {
  private readonly runnables: ReadonlyMap<TaskId, Runnable>;
  private readonly ids: readonly TaskId[];

  constructor(entries: Iterable<readonly [TaskId, Runnable]> = []) {
    const runnables = new Map<TaskId, Runnable>();
    for (const [id, runnable] of entries) {
      assertValidId(id);
      if (runnables.has(id)) {
        throw new DuplicateTaskError(id);
      }
      runnables.set(id, runnable);
    }
    this.runnables = runnables;
    this.ids = Object.freeze([...runnables.keys()].sort());
    log("Registered tasks:", this.ids);
  }

  static from(tasks: Record<TaskId, Runnable>): TaskRegistry {
    return new TaskRegistry(Object.entries(tasks));
  }

  /**
   * Every registered id, sorted, the same on every call
   */
  listTasks(): readonly TaskId[] {
    return this.ids;
  }

  isDefined(id: TaskId): boolean {
    return this.runnables.has(id);
  }

  /**
   * Checks ids in order and reports the first one that is missing.
   * Later ids are not looked at once a missing one is found.
   */
  isDefinedVerbose(
    ids: readonly TaskId[],
    logger: Logger
  ): MissingTask | undefined {
    for (const id of ids) {
      if (!this.isDefined(id)) {
        log(`Missing task ${id}`);
        logger.error(`Task '${id}' is not defined!`);
        return { taskId: id };
      }
    }
    return undefined;
  }

  get(id: TaskId): Runnable {
    const runnable = this.runnables.get(id);
    if (!runnable) {
      throw new UnknownTaskError(id);
    }
    return runnable;
  }
}

export class RegistryBuilder {
  private readonly entries = new Map<TaskId, Runnable>();

  task(id: TaskId, runnable: Runnable): this {
    assertValidId(id);
    if (this.entries.has(id)) {
      throw new DuplicateTaskError(id);
    }
    this.entries.set(id, runnable);
    return this;
  }

  tasks(tasks: Record<TaskId, Runnable>): this {
    for (const [id, runnable] of Object.entries(tasks)) {
      this.task(id, runnable);
    }
    return this;
  }

  build(): TaskRegistry {
    return new TaskRegistry(this.entries);
  }
}

// A dash-prefixed id would be parsed as a flag and never selected
function assertValidId(id: TaskId): void {
  if (id === "" || id.startsWith("-")) {
    throw new InvalidTaskIdError(id);
  }
}
