import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { TaskRegistry } from "../../core/registry";
import { Invoker } from "../../execution/invoker";
import { Sequencer } from "../../execution/sequencer";
import type { Runnable, TaskId } from "../../types";
import { Logger } from "../../utils/logger";
import { type ConsoleSpy, captureConsole, linesOf } from "../helpers/console";
import { recordingTasks } from "../helpers/tasks";

function sequencerFor(tasks: Record<TaskId, Runnable>): Sequencer {
  const logger = new Logger({ timestamps: false });
  const registry = TaskRegistry.from(tasks);
  const invoker = new Invoker({
    createContext: (id, flags) => ({
      flags,
      id,
      logger: logger.createTaskLogger(id),
      parallel: vi.fn(),
      sequence: vi.fn(),
    }),
    logger,
    now: () => 0,
    registry,
  });
  return new Sequencer(registry, invoker, logger);
}

describe("Sequencer", () => {
  let errorSpy: ConsoleSpy;

  beforeEach(() => {
    errorSpy = captureConsole().error;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("runs every task once, in the given order", async () => {
    const { calls, tasks } = recordingTasks({ a: 0, b: 0, c: 0 });
    const sequencer = sequencerFor(tasks);

    const outcome = await sequencer.run(["c", "a", "b"], []);

    expect(calls).toEqual(["c", "a", "b"]);
    expect(outcome.status).toBe("succeeded");
    expect(outcome.exitCode).toBe(0);
  });

  it("stops at the first failure and returns its status", async () => {
    const { calls, tasks } = recordingTasks({ a: 0, b: 3, c: 0 });
    const sequencer = sequencerFor(tasks);

    const outcome = await sequencer.run(["a", "b", "c"], []);

    expect(calls).toEqual(["a", "b"]);
    expect(outcome).toEqual({
      exitCode: 3,
      results: [
        { elapsed: 0, exitCode: 0, id: "a" },
        { elapsed: 0, exitCode: 3, id: "b" },
      ],
      status: "failed",
      taskId: "b",
    });
  });

  it("runs only the tasks up to a failure at the first position", async () => {
    const { calls, tasks } = recordingTasks({ a: 2, b: 0 });
    const outcome = await sequencerFor(tasks).run(["a", "b"], []);

    expect(calls).toEqual(["a"]);
    expect(outcome.exitCode).toBe(2);
  });

  it.each([0, 1, 2])(
    "runs nothing when the id at position %i is undefined",
    async (position) => {
      const { calls, tasks } = recordingTasks({ a: 0, b: 0 });
      const ids = ["a", "b"];
      ids.splice(position, 0, "missing");

      const outcome = await sequencerFor(tasks).run(ids, []);

      expect(calls).toEqual([]);
      expect(outcome).toEqual({
        exitCode: 1,
        status: "missing",
        taskId: "missing",
      });
      expect(linesOf(errorSpy)).toEqual(["Task 'missing' is not defined!"]);
    }
  );

  it("succeeds on an empty list", async () => {
    const outcome = await sequencerFor({}).run([], []);
    expect(outcome).toEqual({ exitCode: 0, results: [], status: "succeeded" });
  });

  it("forwards the same flags to every task", async () => {
    const received: string[][] = [];
    const record: Runnable = ({ flags }) => {
      received.push([...flags]);
    };
    const sequencer = sequencerFor({ a: record, b: record });

    await sequencer.run(["a", "b"], ["--production"]);

    expect(received).toEqual([["--production"], ["--production"]]);
  });

  it("runs a task listed twice twice", async () => {
    const { calls, tasks } = recordingTasks({ a: 0 });
    await sequencerFor(tasks).run(["a", "a"], []);
    expect(calls).toEqual(["a", "a"]);
  });

  it("waits for an asynchronous task before starting the next", async () => {
    const events: string[] = [];
    const sequencer = sequencerFor({
      first: async () => {
        events.push("first:start");
        await new Promise((resolve) => setTimeout(resolve, 5));
        events.push("first:end");
      },
      second: () => {
        events.push("second");
      },
    });

    await sequencer.run(["first", "second"], []);

    expect(events).toEqual(["first:start", "first:end", "second"]);
  });
});
