import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RegistryBuilder } from "../../core/registry";
import { createRunner, Runner } from "../../execution/runner";
import { Logger } from "../../utils/logger";
import { type ConsoleSpy, captureConsole, linesOf } from "../helpers/console";
import { recordingTasks } from "../helpers/tasks";

describe("Runner", () => {
  let logSpy: ConsoleSpy;

  beforeEach(() => {
    logSpy = captureConsole().log;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("main", () => {
    it("runs the tasks named on the command line", async () => {
      const { calls, tasks } = recordingTasks({ build: 0, test: 0 });
      const runner = createRunner(tasks, { timestamps: false });

      expect(await runner.main(["test", "build"])).toBe(0);
      expect(calls).toEqual(["test", "build"]);
    });

    it("falls back to the configured default task", async () => {
      const { calls, tasks } = recordingTasks({ build: 0, watch: 0 });
      const runner = createRunner(tasks, {
        defaultTask: "watch",
        timestamps: false,
      });

      expect(await runner.main(["--poll"])).toBe(0);
      expect(calls).toEqual(["watch"]);
    });

    it("uses 'default' when no default task is configured", async () => {
      const { calls, tasks } = recordingTasks({ default: 4 });
      const runner = createRunner(tasks, { timestamps: false });

      expect(await runner.main([])).toBe(4);
      expect(calls).toEqual(["default"]);
    });

    it("never exits with 0 for a task that returned 256", async () => {
      const runner = createRunner({ big: () => 256 }, { timestamps: false });
      expect(await runner.main(["big"])).toBe(1);
    });

    it("bootstraps only once", async () => {
      const { calls, tasks } = recordingTasks({ a: 0 });
      const runner = createRunner(tasks, { timestamps: false });

      await runner.main(["a"]);
      await runner.main(["a"]);

      expect(calls).toEqual(["a"]);
    });
  });

  describe("composing tasks", () => {
    it("lets a task return the status of a parallel batch", async () => {
      const { calls, tasks } = recordingTasks({ lint: 0, test: 1 });
      const runner = createRunner(
        {
          ...tasks,
          ci: async ({ parallel }) =>
            (await parallel(["lint", "test"])).exitCode,
        },
        { timestamps: false }
      );

      expect(await runner.main(["ci"])).toBe(41);
      expect([...calls].sort()).toEqual(["lint", "test"]);
    });

    it("propagates an all-failed batch as 42", async () => {
      const { tasks } = recordingTasks({ a: 1, b: 1 });
      const runner = createRunner(
        {
          ...tasks,
          both: async ({ parallel }) => (await parallel(["a", "b"])).exitCode,
        },
        { timestamps: false }
      );

      expect(await runner.main(["both"])).toBe(42);
    });

    it("forwards the command line flags into nested runs", async () => {
      const received: Record<string, string[]> = {};
      const runner = createRunner(
        {
          build: async ({ sequence }) => (await sequence(["compile"])).exitCode,
          compile: async ({ parallel }) =>
            (await parallel(["js", "css"])).exitCode,
          css: ({ flags }) => {
            received.css = [...flags];
          },
          js: ({ flags }) => {
            received.js = [...flags];
          },
        },
        { timestamps: false }
      );

      expect(await runner.main(["build", "--production"])).toBe(0);
      expect(received).toEqual({
        css: ["--production"],
        js: ["--production"],
      });
    });

    it("stops a nested sequence at the first failure", async () => {
      const { calls, tasks } = recordingTasks({ a: 0, b: 6, c: 0 });
      const runner = createRunner(
        {
          ...tasks,
          release: async ({ sequence }) =>
            (await sequence(["a", "b", "c"])).exitCode,
        },
        { timestamps: false }
      );

      expect(await runner.main(["release"])).toBe(6);
      expect(calls).toEqual(["a", "b"]);
    });

    it("fails a task whose nested run names an undefined task", async () => {
      const runner = createRunner(
        {
          outer: async ({ sequence }) => (await sequence(["ghost"])).exitCode,
        },
        { timestamps: false }
      );

      expect(await runner.main(["outer"])).toBe(1);
    });

    it("gives each task a logger prefixed with its id", async () => {
      const runner = createRunner(
        {
          greet: ({ logger }) => {
            logger.log("hello");
          },
        },
        { timestamps: false }
      );

      await runner.invoke("greet");

      expect(linesOf(logSpy)).toContain("[greet] | hello");
    });
  });

  describe("direct calls", () => {
    it("exposes the registry listing", () => {
      const runner = new Runner({
        registry: new RegistryBuilder()
          .task("z", () => 0)
          .task("a", () => 0)
          .build(),
      });
      expect(runner.listTasks()).toEqual(["a", "z"]);
    });

    it("uses the logger it is given", async () => {
      const logger = new Logger({ quiet: true });
      const runner = createRunner({ a: () => 0 }, { logger });

      await runner.sequence(["a"]);

      expect(runner.logger).toBe(logger);
      expect(logSpy).not.toHaveBeenCalled();
    });

    it("measures with the injected clock", async () => {
      let reading = 0;
      const runner = createRunner(
        { a: () => 0 },
        {
          now: () => {
            reading += 100;
            return reading;
          },
          timestamps: false,
        }
      );

      const result = await runner.invoke("a");

      expect(result.elapsed).toBe(100);
      expect(linesOf(logSpy)).toContain("Finished 'a' after 100 ms");
    });
  });
});
