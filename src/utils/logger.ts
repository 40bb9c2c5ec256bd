import ansis from "ansis";
import type { LoggerOptions, LogLevel } from "../types";

const colors = [
  ansis.cyan,
  ansis.green,
  ansis.yellow,
  ansis.blue,
  ansis.magenta,
  ansis.red,
  ansis.gray,
  ansis.white,
] as const;

const levelColors: Record<LogLevel, (text: string) => string> = {
  error: ansis.red,
  info: (text) => text,
  success: ansis.green,
  warn: ansis.yellow,
};

const TIMESTAMP_LENGTH = "HH:MM:SS".length;

export class Logger {
  private readonly colorMap = new Map<string, (typeof colors)[number]>();
  private colorIndex = 0;
  private maxPrefixLength = 0;
  private readonly options: Required<LoggerOptions>;

  constructor(options: LoggerOptions = {}) {
    this.options = {
      clock: () => new Date(),
      quiet: false,
      timestamps: true,
      ...options,
    };
  }

  registerTask(taskName: string): void {
    if (!this.colorMap.has(taskName)) {
      const color = colors[this.colorIndex % colors.length];
      if (color) {
        this.colorMap.set(taskName, color);
      }
      this.colorIndex++;
      this.maxPrefixLength = Math.max(this.maxPrefixLength, taskName.length);
    }
  }

  info(message: string): void {
    if (this.options.quiet) {
      return;
    }
    console.log(this.formatLine(message, "info"));
  }

  success(message: string): void {
    if (this.options.quiet) {
      return;
    }
    console.log(this.formatLine(message, "success"));
  }

  warn(message: string): void {
    console.warn(this.formatLine(message, "warn"));
  }

  error(message: string): void {
    console.error(this.formatLine(message, "error"));
  }

  /**
   * Output produced by a running task, one prefixed line per input line.
   */
  taskLog(taskName: string, message: string): void {
    if (this.options.quiet) {
      return;
    }
    for (const line of message.split("\n")) {
      if (!line.trim()) {
        continue;
      }
      console.log(this.formatLine(this.prefixTask(taskName, line), "info"));
    }
  }

  taskError(taskName: string, message: string): void {
    for (const line of message.split("\n")) {
      if (!line.trim()) {
        continue;
      }
      const prefixed = this.prefixTask(taskName, ansis.red(line));
      console.error(this.formatLine(prefixed, "info"));
    }
  }

  formatLine(text: string, level: LogLevel): string {
    const colored = levelColors[level](text);
    if (!this.options.timestamps) {
      return colored;
    }
    return `[${ansis.gray(this.timestamp())}] ${colored}`;
  }

  colorTask(taskName: string): string {
    return ansis.cyan(taskName);
  }

  colorDuration(duration: string): string {
    return ansis.magenta(duration);
  }

  colorMuted(text: string): string {
    return ansis.gray(text);
  }

  /**
   * Create a child logger for a specific task
   */
  createTaskLogger(taskName: string): TaskLogger {
    this.registerTask(taskName);
    return new TaskLogger(this, taskName);
  }

  private timestamp(): string {
    return this.options.clock().toTimeString().slice(0, TIMESTAMP_LENGTH);
  }

  private prefixTask(taskName: string, line: string): string {
    const color = this.colorMap.get(taskName) ?? ansis.white;
    // Pad to align the pipe separator across tasks
    const prefix = `[${taskName}]`.padEnd(this.maxPrefixLength + 2);
    return `${color(prefix)} ${ansis.gray("|")} ${line}`;
  }
}

export class TaskLogger {
  private readonly parent: Logger;
  readonly taskName: string;

  constructor(parent: Logger, taskName: string) {
    this.parent = parent;
    this.taskName = taskName;
  }

  log(message: string): void {
    this.parent.taskLog(this.taskName, message);
  }

  error(message: string): void {
    this.parent.taskError(this.taskName, message);
  }
}
