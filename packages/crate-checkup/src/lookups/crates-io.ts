import semver from "semver";

import { createNoopLogger } from "../core/debug-logger.js";

import type {
  DebugLogger,
  LookupError,
  LookupResult,
  RegistryLookup,
} from "../types/index.js";

export const CRATES_IO_API = "https://crates.io/api/v1/crates";
const REQUEST_TIMEOUT_MS = 5_000;
const RETRY_DELAY_MS = 250;

export interface CratesIoOptions {
  userAgent: string;
  baseUrl?: string;
  requestTimeoutMs?: number;
  /** at most this many retries, and only for network failures */
  retries?: number;
  fetchImpl?: typeof fetch;
  logger?: DebugLogger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status <= 599);
}

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Pull the newest stable version out of a `/api/v1/crates/<name>` body.
 */
export function readLatestVersion(body: unknown): LookupResult {
  const crate = isRecord(body) ? body.crate : undefined;
  if (!isRecord(crate)) {
    return { ok: false, error: { kind: "malformed", message: "response has no 'crate' object" } };
  }
  for (const key of ["max_stable_version", "max_version"]) {
    const value = crate[key];
    if (typeof value === "string" && semver.valid(value)) {
      return { ok: true, version: value };
    }
  }
  return {
    ok: false,
    error: { kind: "malformed", message: "response has no usable 'max_version'" },
  };
}

export class CratesIoRegistry implements RegistryLookup {
  private readonly baseUrl: string;
  private readonly requestTimeoutMs: number;
  private readonly retries: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: DebugLogger;

  constructor(private readonly options: CratesIoOptions) {
    this.baseUrl = options.baseUrl ?? CRATES_IO_API;
    this.requestTimeoutMs = options.requestTimeoutMs ?? REQUEST_TIMEOUT_MS;
    this.retries = options.retries ?? 1;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? createNoopLogger();
  }

  // an unread body holds its connection until cancelled
  private async discardBody(response: Response): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (error) {
      this.logger.log("registry", "could not discard response body", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async latestVersion(packageName: string, signal?: AbortSignal): Promise<LookupResult> {
    const url = `${this.baseUrl}/${encodeURIComponent(packageName)}`;
    let lastError: LookupError = { kind: "network", message: "request not attempted" };

    for (let attempt = 0; attempt <= this.retries; attempt++) {
      if (signal?.aborted) {
        return { ok: false, error: { kind: "network", message: "lookup cancelled" } };
      }
      if (attempt > 0) await sleep(RETRY_DELAY_MS);

      const requestSignal = signal
        ? AbortSignal.any([signal, AbortSignal.timeout(this.requestTimeoutMs)])
        : AbortSignal.timeout(this.requestTimeoutMs);

      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          headers: {
            "User-Agent": this.options.userAgent,
            Accept: "application/json",
          },
          signal: requestSignal,
        });
      } catch (error) {
        const timedOut = error instanceof Error && error.name === "TimeoutError";
        lastError = {
          kind: "network",
          message: timedOut
            ? `request timed out after ${this.requestTimeoutMs}ms`
            : error instanceof Error
              ? error.message
              : String(error),
        };
        this.logger.log("registry", "request failed", { crate: packageName, attempt, error: lastError.message });
        continue;
      }

      if (response.status === 404) {
        await this.discardBody(response);
        return {
          ok: false,
          error: { kind: "not-found", message: `crate '${packageName}' is not published on crates.io` },
        };
      }
      if (!response.ok) {
        await this.discardBody(response);
        lastError = { kind: "network", message: `HTTP ${response.status} ${response.statusText}` };
        this.logger.log("registry", "bad status", { crate: packageName, attempt, status: response.status });
        if (isRetryableStatus(response.status)) continue;
        return { ok: false, error: lastError };
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        return {
          ok: false,
          error: {
            kind: "malformed",
            message: `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
          },
        };
      }

      const result = readLatestVersion(body);
      this.logger.log("registry", "lookup finished", {
        crate: packageName,
        ok: result.ok,
        ...(result.ok ? { version: result.version } : { error: result.error.message }),
      });
      return result;
    }

    return { ok: false, error: lastError };
  }
}
