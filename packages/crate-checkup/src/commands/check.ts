import * as path from "node:path";
import ora from "ora";

import {
  createDefaultConfig,
  MAX_TIMEOUT_SECS,
  resolveConfig,
  timeoutSecsToMs,
} from "../core/config.js";
import { buildProjectContext } from "../core/context.js";
import { createLogger } from "../core/debug-logger.js";
import { execute } from "../core/executor.js";
import { ConfigError, ContextError } from "../core/errors.js";
import { getPackageVersion } from "../core/paths.js";
import { exitCodeFor } from "../core/report.js";
import { formatReportHuman } from "../formatters/human.js";
import { formatReportJson } from "../formatters/json.js";
import { CargoAuditRunner } from "../lookups/cargo-audit.js";
import { CratesIoRegistry } from "../lookups/crates-io.js";

import type {
  CheckOptions,
  DebugLogger,
  LookupClients,
  OutputFormat,
  ProjectConfig,
  ProjectContext,
} from "../types/index.js";

export interface CheckCommandDeps {
  /** replaces the crates.io and cargo-audit clients */
  lookups?: LookupClients;
}

type Parsed<T> = { ok: true; value: T } | { ok: false; error: string };

function parseFormat(raw: string | undefined): Parsed<OutputFormat> {
  const value = raw ?? "human";
  if (value === "human" || value === "json") return { ok: true, value };
  return { ok: false, error: `invalid --format value "${value}". Use human or json` };
}

function parsePositiveInteger(raw: string | undefined, flag: string): Parsed<number | undefined> {
  if (raw === undefined) return { ok: true, value: undefined };
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    return { ok: false, error: `invalid ${flag} value "${raw}". Use a positive integer` };
  }
  return { ok: true, value };
}

function parseTimeout(raw: string | undefined): Parsed<number | undefined> {
  if (raw === undefined) return { ok: true, value: undefined };
  const ms = timeoutSecsToMs(Number(raw));
  if (ms === null) {
    return {
      ok: false,
      error: `invalid --timeout value "${raw}". Use seconds between 0.001 and ${MAX_TIMEOUT_SECS}`,
    };
  }
  return { ok: true, value: ms };
}

function loadConfig(root: string, logger: DebugLogger): ProjectConfig {
  try {
    return resolveConfig(root, logger);
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    console.error(`Config error: ${error.where}: ${error.message}. Continuing with defaults.`);
    logger.log("config", "config rejected", { where: error.where, error: error.message });
    return createDefaultConfig();
  }
}

function defaultLookups(logger: DebugLogger, timeoutMs: number | undefined): LookupClients {
  return {
    registry: new CratesIoRegistry({
      userAgent: `crate-checkup/${getPackageVersion()}`,
      logger,
    }),
    audit: new CargoAuditRunner({ logger, ...(timeoutMs ? { timeoutMs } : {}) }),
  };
}

export async function checkCommand(
  projectPath: string | undefined,
  options: CheckOptions,
  deps: CheckCommandDeps = {},
): Promise<number> {
  const resolved = path.resolve(projectPath ?? options.projectPath ?? ".");

  const format = parseFormat(options.format);
  const timeout = parseTimeout(options.timeout);
  const concurrency = parsePositiveInteger(options.concurrency, "--concurrency");
  for (const parsed of [format, timeout, concurrency]) {
    if (!parsed.ok) {
      console.error(`Error: ${parsed.error}`);
      return 2;
    }
  }
  const outputFormat: OutputFormat = format.ok ? format.value : "human";
  const timeoutMs = timeout.ok ? timeout.value : undefined;

  const logger = createLogger(resolved, options.debugLog);

  let context: ProjectContext;
  try {
    context = await buildProjectContext(resolved, logger);
  } catch (error) {
    if (error instanceof ContextError) {
      console.error(`Error: ${error.message}`);
      return 2;
    }
    throw error;
  }

  const config = loadConfig(context.root, logger);
  const effectiveTimeoutMs =
    timeoutMs ??
    (config.general.timeoutSecs !== undefined
      ? (timeoutSecsToMs(config.general.timeoutSecs) ?? undefined)
      : undefined);
  const lookups = deps.lookups ?? defaultLookups(logger, effectiveTimeoutMs);

  const onProgress = options.verbose
    ? (message: string) => {
        console.error(message);
      }
    : undefined;

  const spinner =
    outputFormat === "human" && !options.verbose
      ? ora({ text: "Running checks...", stream: process.stderr }).start()
      : null;

  try {
    const report = await execute(context, config, lookups, {
      logger,
      onProgress,
      ...(timeoutMs !== undefined ? { timeoutMs } : {}),
      ...(concurrency.ok && concurrency.value !== undefined
        ? { concurrency: concurrency.value }
        : {}),
      ...(options.offline ? { offline: true } : {}),
    });
    spinner?.stop();

    if (outputFormat === "json") {
      console.log(formatReportJson(report));
    } else {
      const projectName = context.manifest?.package?.name ?? path.basename(context.root);
      console.log(await formatReportHuman(report, projectName));
    }

    return exitCodeFor(report);
  } catch (error) {
    spinner?.fail("Checks aborted");
    throw error;
  }
}
