import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { PackageLoadError } from "../errors";
import type { PackageTasks, Script } from "../types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reads the scripts of a package.json and the default task from its
 * `runnel.defaultTask` field.
 */
export function loadPackageTasks(cwd: string = process.cwd()): PackageTasks {
  const packagePath = join(cwd, "package.json");

  if (!existsSync(packagePath)) {
    throw new PackageLoadError(packagePath, "No package.json found");
  }

  let packageJson: unknown;
  try {
    packageJson = JSON.parse(readFileSync(packagePath, "utf-8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new PackageLoadError(
      packagePath,
      `Error reading package.json: ${message}`
    );
  }

  if (!isRecord(packageJson)) {
    throw new PackageLoadError(packagePath, "package.json is not an object");
  }

  const scripts: Script[] = [];
  if (isRecord(packageJson.scripts)) {
    for (const [name, command] of Object.entries(packageJson.scripts)) {
      // Skip comments, and names the command line would read as flags
      if (
        name === "" ||
        name.startsWith("//") ||
        name.startsWith("-") ||
        typeof command !== "string"
      ) {
        continue;
      }
      scripts.push({ command, name });
    }
  }

  const settings = packageJson.runnel;
  const defaultTask =
    isRecord(settings) && typeof settings.defaultTask === "string"
      ? settings.defaultTask
      : undefined;

  return { defaultTask, scripts };
}
