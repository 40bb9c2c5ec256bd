import { delimiter, join } from "node:path";
import type { Readable } from "node:stream";
import debug from "debug";
import { execa } from "execa";
import { EXIT_GENERAL_ERROR } from "../exit-codes";
import type { Flags, Runnable } from "../types";

const log = debug("runnel:command");

const SAFE_ARG = /^[\w@%+=:,./-]+$/;
const TRAILING_CR = /\r$/;

export type CommandOptions = {
  cwd?: string;
  env?: Record<string, string>;
};

/**
 * Writes each complete UTF-8 line of the stream. A partial line is held
 * until its newline arrives or the stream closes.
 */
export function forwardLines(
  stream: Readable | null,
  write: (line: string) => void
): Promise<void> {
  if (!stream) {
    return Promise.resolve();
  }
  stream.setEncoding("utf8");
  let pending = "";

  stream.on("data", (chunk: string) => {
    const lines = `${pending}${chunk}`.split("\n");
    pending = lines.pop() ?? "";
    for (const line of lines) {
      write(line.replace(TRAILING_CR, ""));
    }
  });

  return new Promise((resolve) => {
    stream.once("close", () => {
      if (pending) {
        write(pending.replace(TRAILING_CR, ""));
        pending = "";
      }
      resolve();
    });
  });
}

function quoteArg(arg: string): string {
  if (SAFE_ARG.test(arg)) {
    return arg;
  }
  return `'${arg.replaceAll("'", "'\\''")}'`;
}

export function buildCommandLine(commandLine: string, flags: Flags): string {
  return [commandLine, ...flags.map(quoteArg)].join(" ");
}

/**
 * A task that runs a shell command, the way npm runs scripts, with the
 * task's flags appended to the command line. Its status is the command's
 * exit code.
 */
export function command(
  commandLine: string,
  options: CommandOptions = {}
): Runnable {
  return async ({ id, flags, logger }) => {
    const cwd = options.cwd ?? process.cwd();
    const npmBinPath = join(cwd, "node_modules", ".bin");
    const fullCommand = buildCommandLine(commandLine, flags);
    log(`Task ${id} runs: ${fullCommand}`);

    // Uses /bin/sh on Unix, cmd.exe on Windows
    const proc = execa(fullCommand, {
      cwd,
      env: {
        ...process.env,
        ...options.env,
        PATH: `${npmBinPath}${delimiter}${process.env.PATH ?? ""}`,
      },
      // Output goes to the task logger line by line, nothing reads it back
      buffer: false,
      reject: false,
      shell: true,
      stdio: "pipe",
    });

    const [result] = await Promise.all([
      proc,
      forwardLines(proc.stdout, (line) => logger.log(line)),
      forwardLines(proc.stderr, (line) => logger.error(line)),
    ]);
    if (typeof result.exitCode !== "number") {
      // Killed by a signal or never spawned
      log(`Task ${id} ended without an exit code:`, result.signal);
      return EXIT_GENERAL_ERROR;
    }
    return result.exitCode;
  };
}
