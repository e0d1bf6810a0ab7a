import { execa, ExecaError } from "execa";

import { createNoopLogger } from "../core/debug-logger.js";

import type { Advisory, AuditResult, AuditRunner, DebugLogger } from "../types/index.js";

const AUDIT_ARGS = ["audit", "--json", "--quiet"];
const DEFAULT_TIMEOUT_MS = 60_000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asText(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function firstLine(text: string): string {
  return text.trim().split("\n")[0] ?? "";
}

/**
 * Validate `cargo audit --json` output by hand and flatten it into advisories.
 */
export function parseAuditOutput(stdout: string): AuditResult {
  let data: unknown;
  try {
    data = JSON.parse(stdout);
  } catch (error) {
    return {
      ok: false,
      error: {
        kind: "unparseable",
        message: `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      },
    };
  }

  const vulnerabilities = isRecord(data) ? data.vulnerabilities : undefined;
  if (!isRecord(vulnerabilities) || !Array.isArray(vulnerabilities.list)) {
    return {
      ok: false,
      error: { kind: "unparseable", message: "missing 'vulnerabilities.list'" },
    };
  }

  const advisories: Advisory[] = [];
  for (const [index, entry] of vulnerabilities.list.entries()) {
    const advisory = isRecord(entry) ? entry.advisory : undefined;
    const pkg = isRecord(entry) ? entry.package : undefined;
    if (
      !isRecord(advisory) ||
      !isRecord(pkg) ||
      typeof advisory.id !== "string" ||
      typeof pkg.name !== "string"
    ) {
      return {
        ok: false,
        error: { kind: "unparseable", message: `vulnerability #${index} lacks advisory id or package name` },
      };
    }

    const versions = isRecord(entry) ? entry.versions : undefined;
    const patched =
      isRecord(versions) && Array.isArray(versions.patched)
        ? versions.patched.filter((v): v is string => typeof v === "string")
        : [];

    const item: Advisory = {
      packageName: pkg.name,
      advisoryId: advisory.id,
      title: typeof advisory.title === "string" ? advisory.title : advisory.id,
      patched,
    };
    if (typeof pkg.version === "string") item.packageVersion = pkg.version;
    if (typeof advisory.severity === "string") item.severity = advisory.severity;
    advisories.push(item);
  }

  return { ok: true, advisories };
}

export interface CargoAuditOptions {
  timeoutMs?: number;
  /** defaults to `cargo` */
  command?: string;
  logger?: DebugLogger;
}

/**
 * Runs `cargo audit --json --quiet` once per project. Never retries.
 */
export class CargoAuditRunner implements AuditRunner {
  private readonly timeoutMs: number;
  private readonly command: string;
  private readonly logger: DebugLogger;

  constructor(options: CargoAuditOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.command = options.command ?? "cargo";
    this.logger = options.logger ?? createNoopLogger();
  }

  async run(projectRoot: string, signal?: AbortSignal): Promise<AuditResult> {
    this.logger.log("audit", "running cargo audit", { cwd: projectRoot, timeoutMs: this.timeoutMs });

    let stdout: string;
    try {
      const result = await execa(this.command, AUDIT_ARGS, {
        cwd: projectRoot,
        timeout: this.timeoutMs,
        ...(signal ? { cancelSignal: signal } : {}),
        env: { CARGO_TERM_COLOR: "never" },
      });
      stdout = result.stdout;
    } catch (error) {
      if (!(error instanceof ExecaError)) throw error;
      return this.classifyFailure(error);
    }

    return parseAuditOutput(stdout);
  }

  private classifyFailure(error: ExecaError): AuditResult {
    const stderr = asText(error.stderr);
    const stdout = asText(error.stdout);
    this.logger.log("audit", "cargo audit exited abnormally", {
      exitCode: error.exitCode,
      code: error.code,
      timedOut: error.timedOut,
      stderr: firstLine(stderr),
    });

    if (error.code === "ENOENT") {
      return {
        ok: false,
        error: { kind: "binary-missing", message: `'${this.command}' not found on PATH` },
      };
    }
    if (error.timedOut || error.isCanceled) {
      return {
        ok: false,
        error: { kind: "timeout", message: `no result within ${this.timeoutMs}ms` },
      };
    }
    if (/no such (sub)?command/i.test(stderr)) {
      return {
        ok: false,
        error: { kind: "tool-missing", message: firstLine(stderr) },
      };
    }

    // vulnerabilities found: non-zero exit with a JSON report on stdout
    if (stdout.trim()) {
      return parseAuditOutput(stdout);
    }
    return {
      ok: false,
      error: {
        kind: "unparseable",
        message: firstLine(stderr) || `exit code ${String(error.exitCode)} with no output`,
      },
    };
  }
}
