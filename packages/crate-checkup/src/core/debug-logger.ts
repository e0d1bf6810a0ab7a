/**
 * Debug logger: JSON lines appended to a file, rotated at 1MB.
 */

import fs from "node:fs";
import path from "node:path";

import type { DebugLogger, LogCategory } from "../types/index.js";

export const DEBUG_ENV = "CRATE_CHECKUP_DEBUG";
const MAX_FILE_SIZE = 1024 * 1024;

export class FileDebugLogger implements DebugLogger {
  private readonly categories: LogCategory[] | null;

  constructor(
    private readonly logFile: string,
    categories?: LogCategory[],
  ) {
    this.categories = categories?.length ? categories : null;
  }

  log(category: LogCategory, message: string, data?: object): void {
    if (this.categories && !this.categories.includes(category)) return;

    const entry = JSON.stringify({
      ...data, // reserved keys below win
      t: new Date().toISOString(),
      pid: process.pid,
      cat: category,
      msg: message,
    });

    this.writeLogSafe(entry + "\n");
  }

  private writeLogSafe(line: string): void {
    try {
      fs.mkdirSync(path.dirname(this.logFile), { recursive: true });
      this.tryRotate();
      fs.appendFileSync(this.logFile, line);
    } catch {
      // logging must never fail a run
    }
  }

  private tryRotate(): void {
    let size: number;
    try {
      size = fs.statSync(this.logFile).size;
    } catch {
      return; // not created yet
    }
    if (size <= MAX_FILE_SIZE) return;
    const backup = this.logFile + ".1";
    fs.rmSync(backup, { force: true });
    fs.renameSync(this.logFile, backup);
  }
}

class NoopLogger implements DebugLogger {
  log(): void {
    // disabled
  }
}

export function createNoopLogger(): DebugLogger {
  return new NoopLogger();
}

export function defaultLogFile(projectRoot: string): string {
  return path.join(projectRoot, "target", "crate-checkup", "debug.log");
}

/**
 * `--debug-log <file>` wins; otherwise `CRATE_CHECKUP_DEBUG=1` logs to
 * `target/crate-checkup/debug.log` under the project root.
 */
export function createLogger(
  projectRoot: string,
  logFile?: string,
  env: NodeJS.ProcessEnv = process.env,
): DebugLogger {
  if (logFile) {
    return new FileDebugLogger(path.resolve(logFile));
  }
  const flag = env[DEBUG_ENV];
  if (flag === "1" || flag === "true") {
    return new FileDebugLogger(defaultLogFile(projectRoot));
  }
  return createNoopLogger();
}
