import type { ParsedArgs } from "../types";

export class Parser {
  parse(args: readonly string[]): ParsedArgs {
    const result: ParsedArgs = {
      flags: [],
      tasks: [],
    };

    for (const arg of args) {
      this.processArg(arg, result);
    }

    return result;
  }

  private processArg(arg: string, result: ParsedArgs): void {
    // Shells hand over empty strings for quoted blanks
    if (arg === "") {
      return;
    }
    if (arg.startsWith("-")) {
      // Flags are not interpreted here, every task receives them as-is
      result.flags.push(arg);
    } else {
      result.tasks.push(arg);
    }
  }
}

export function parseArgs(args: readonly string[]): ParsedArgs {
  const parser = new Parser();
  return parser.parse(args);
}
