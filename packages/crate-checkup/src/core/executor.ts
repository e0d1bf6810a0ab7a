import * as os from "node:os";

import { isCheckEnabled, MAX_TIMEOUT_MS, timeoutSecsToMs } from "./config.js";
import { createDiagnostic } from "./diagnostic.js";
import { createNoopLogger } from "./debug-logger.js";
import { CheckTimeoutError } from "./errors.js";
import { runPool } from "./pool.js";
import { ALL_CHECKS, ENGINE_CODES, knownCodes } from "./registry.js";
import { buildReport } from "./report.js";
import { RunCache } from "./run-cache.js";

import type {
  CheckDefinition,
  CheckRuntime,
  DebugLogger,
  Diagnostic,
  LookupClients,
  ProjectConfig,
  ProjectContext,
  Report,
} from "../types/index.js";

export const DEFAULT_TIMEOUT_MS = 10_000;

export interface ExecuteOptions {
  /** defaults to the full registry */
  checks?: readonly CheckDefinition[];
  concurrency?: number;
  /** per-check limit for network and subprocess checks */
  timeoutMs?: number;
  offline?: boolean;
  cache?: RunCache;
  logger?: DebugLogger;
  onProgress?: (message: string) => void;
}

function isExternal(check: CheckDefinition): boolean {
  return check.capability === "network" || check.capability === "subprocess";
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  controller: AbortController,
  code: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new CheckTimeoutError(code, timeoutMs));
    }, timeoutMs);
  });
  return Promise.race([work, deadline]).finally(() => clearTimeout(timer));
}

/**
 * Run every enabled check against the context and collect one report.
 *
 * Checks never abort the run: a throwing check becomes an IO002 warning and a
 * slow network or subprocess check is abandoned with its timeout code.
 */
export async function execute(
  context: ProjectContext,
  config: ProjectConfig,
  lookups: LookupClients,
  options: ExecuteOptions = {},
): Promise<Report> {
  const checks = options.checks ?? ALL_CHECKS;
  const logger = options.logger ?? createNoopLogger();
  const cache = options.cache ?? new RunCache();
  const offline = options.offline ?? config.general.offline ?? false;
  const requestedTimeoutMs =
    options.timeoutMs ??
    (config.general.timeoutSecs !== undefined
      ? timeoutSecsToMs(config.general.timeoutSecs)
      : null) ??
    DEFAULT_TIMEOUT_MS;
  const timeoutMs = Math.min(Math.max(Math.round(requestedTimeoutMs), 1), MAX_TIMEOUT_MS);
  const concurrency =
    options.concurrency ?? config.general.concurrency ?? os.availableParallelism();
  const progress = options.onProgress ?? (() => undefined);

  const known = new Set(knownCodes(checks));
  for (const code of Object.keys(config.checks)) {
    if (!known.has(code)) {
      logger.log("executor", "config names an unknown code", { code });
    }
  }

  const scheduled = checks.filter((check) => {
    if (!isCheckEnabled(config.checks, check.code)) {
      logger.log("executor", "check disabled", { code: check.code });
      return false;
    }
    if (offline && isExternal(check)) {
      logger.log("executor", "check skipped offline", { code: check.code });
      progress(`[${check.code}] skipped (offline)`);
      return false;
    }
    return true;
  });

  logger.log("executor", "run started", {
    scheduled: scheduled.map((c) => c.code),
    concurrency,
    timeoutMs,
    offline,
  });

  const runOne = async (check: CheckDefinition): Promise<Diagnostic[]> => {
    const controller = new AbortController();
    const runtime: CheckRuntime = { lookups, cache, signal: controller.signal, logger };
    const started = Date.now();
    progress(`[${check.code}] ${check.name}...`);

    const work = Promise.resolve().then(() => check.run(context, runtime));
    try {
      const diagnostics = isExternal(check)
        ? await withTimeout(work, timeoutMs, controller, check.code)
        : await work;
      const elapsed = Date.now() - started;
      logger.log("check", "check finished", {
        code: check.code,
        diagnostics: diagnostics.length,
        ms: elapsed,
      });
      progress(`[${check.code}] done (${diagnostics.length} found, ${elapsed}ms)`);
      return diagnostics;
    } catch (error) {
      if (error instanceof CheckTimeoutError) {
        // the abandoned work may still settle; keep its outcome out of the report
        work.catch((late: unknown) => {
          logger.log("check", "abandoned check rejected", {
            code: check.code,
            error: errorMessage(late),
          });
        });
        logger.log("check", "check timed out", { code: check.code, timeoutMs });
        progress(`[${check.code}] timed out after ${timeoutMs}ms`);
        return [
          createDiagnostic({
            code: check.timeoutCode ?? ENGINE_CODES.checkTimeout,
            severity: "warning",
            message: `Check ${check.code} (${check.name}) did not finish within ${timeoutMs}ms; its results are omitted.`,
            fixHint: "Raise --timeout or general.timeout_secs, or run with --offline",
          }),
        ];
      }

      logger.log("check", "check failed", { code: check.code, error: errorMessage(error) });
      progress(`[${check.code}] failed: ${errorMessage(error)}`);
      return [
        createDiagnostic({
          code: ENGINE_CODES.checkFault,
          severity: "warning",
          message: `Check ${check.code} failed unexpectedly: ${errorMessage(error)}`,
        }),
      ];
    }
  };

  // one slot per scheduled check so output order follows the registry, not completion
  const slots: Diagnostic[][] = scheduled.map(() => []);
  await runPool(scheduled, concurrency, async (check, index) => {
    slots[index] = await runOne(check);
  });

  const collected = slots
    .flat()
    .filter((diagnostic) => isCheckEnabled(config.checks, diagnostic.code));

  const report = buildReport(collected);
  logger.log("executor", "run finished", { ...report.summary });
  return report;
}
