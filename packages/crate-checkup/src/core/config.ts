import * as fs from "node:fs";
import * as path from "node:path";
import { parse, TomlError } from "smol-toml";

import { ConfigError } from "./errors.js";

import type {
  CheckConfig,
  DebugLogger,
  GeneralConfig,
  ProjectConfig,
} from "../types/index.js";

export const CONFIG_FILENAME = ".crate-checkup.toml";

const TOP_LEVEL_KEYS = ["checks", "general"];
const CHECKS_KEYS = ["enabled"];
const GENERAL_KEYS = ["timeout_secs", "concurrency", "offline"];

// setTimeout overflows above a signed 32-bit delay
export const MAX_TIMEOUT_MS = 2_147_483_647;
export const MAX_TIMEOUT_SECS = Math.floor(MAX_TIMEOUT_MS / 1000);

/** Seconds to whole milliseconds, or null when the result is not a usable timer delay. */
export function timeoutSecsToMs(secs: number): number | null {
  if (!Number.isFinite(secs)) return null;
  const ms = Math.round(secs * 1000);
  return ms >= 1 && ms <= MAX_TIMEOUT_MS ? ms : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function createDefaultConfig(): ProjectConfig {
  return { checks: {}, general: {} };
}

/**
 * Default-allow: a check runs unless the config names its code with `false`.
 */
export function isCheckEnabled(checks: CheckConfig, code: string): boolean {
  return checks[code] ?? true;
}

/**
 * Read `.crate-checkup.toml` from the project root.
 *
 * A missing or unreadable file yields the all-enabled default. Malformed TOML
 * and unknown keys throw {@link ConfigError}.
 */
export function resolveConfig(projectRoot: string, logger?: DebugLogger): ProjectConfig {
  const configPath = path.join(projectRoot, CONFIG_FILENAME);

  let source: string;
  try {
    source = fs.readFileSync(configPath, "utf8");
  } catch (error) {
    const code = error instanceof Error && "code" in error ? error.code : undefined;
    if (code !== "ENOENT") {
      logger?.log("config", "config file unreadable, using defaults", {
        file: configPath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    return createDefaultConfig();
  }

  const config = parseConfig(source, configPath);
  logger?.log("config", "config loaded", {
    file: configPath,
    disabled: Object.keys(config.checks).filter((code) => config.checks[code] === false),
  });
  return config;
}

export function parseConfig(source: string, filePath: string): ProjectConfig {
  let data: unknown;
  try {
    data = parse(source);
  } catch (error) {
    if (error instanceof TomlError) {
      throw new ConfigError(`Malformed TOML: ${firstLine(error.message)}`, {
        file: filePath,
        line: error.line,
        column: error.column,
      });
    }
    throw error;
  }

  if (!isRecord(data)) {
    return createDefaultConfig();
  }

  const fail = (message: string, keyPath: string): never => {
    throw new ConfigError(message, {
      file: filePath,
      line: locateKey(source, keyPath),
      keyPath,
    });
  };

  for (const key of Object.keys(data)) {
    if (!TOP_LEVEL_KEYS.includes(key)) {
      fail(`Unknown section '${key}'`, key);
    }
  }

  const config = createDefaultConfig();

  if (data.checks !== undefined) {
    if (!isRecord(data.checks)) {
      fail("'checks' must be a table", "checks");
    } else {
      for (const key of Object.keys(data.checks)) {
        if (!CHECKS_KEYS.includes(key)) {
          fail(
            `Unknown key '${key}' in [checks], expected one of: ${CHECKS_KEYS.join(", ")}`,
            `checks.${key}`,
          );
        }
      }
      const enabled = data.checks.enabled;
      if (enabled !== undefined) {
        if (!isRecord(enabled)) {
          fail("'checks.enabled' must be a table of code = boolean", "checks.enabled");
        } else {
          for (const [code, value] of Object.entries(enabled)) {
            if (typeof value !== "boolean") {
              fail(`'checks.enabled.${code}' must be true or false`, `checks.enabled.${code}`);
            } else {
              config.checks[code] = value;
            }
          }
        }
      }
    }
  }

  if (data.general !== undefined) {
    if (!isRecord(data.general)) {
      fail("'general' must be a table", "general");
    } else {
      config.general = parseGeneral(data.general, fail);
    }
  }

  return config;
}

function parseGeneral(
  table: Record<string, unknown>,
  fail: (message: string, keyPath: string) => never,
): GeneralConfig {
  const general: GeneralConfig = {};
  for (const [key, value] of Object.entries(table)) {
    const keyPath = `general.${key}`;
    switch (key) {
      case "timeout_secs":
        if (typeof value !== "number" || timeoutSecsToMs(value) === null) {
          fail(
            `'general.timeout_secs' must be a number between 0.001 and ${MAX_TIMEOUT_SECS}`,
            keyPath,
          );
        } else {
          general.timeoutSecs = value;
        }
        break;
      case "concurrency":
        if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
          fail("'general.concurrency' must be a positive integer", keyPath);
        } else {
          general.concurrency = value;
        }
        break;
      case "offline":
        if (typeof value !== "boolean") {
          fail("'general.offline' must be true or false", keyPath);
        } else {
          general.offline = value;
        }
        break;
      default:
        fail(
          `Unknown key '${key}' in [general], expected one of: ${GENERAL_KEYS.join(", ")}`,
          keyPath,
        );
    }
  }
  return general;
}

function firstLine(message: string): string {
  return message.split("\n")[0] ?? message;
}

/**
 * Best-effort 1-based line of the last segment of a dotted key path.
 * Matches `key =`, `"key" =`, `[key]`, `[a.key]` and inline `key =` inside braces.
 */
export function locateKey(source: string, keyPath: string): number | undefined {
  const segment = keyPath.split(".").pop();
  if (!segment) return undefined;
  const escaped = segment.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  const assignment = new RegExp(`(^|[{,\\s])"?${escaped}"?\\s*=`);
  const header = new RegExp(`^\\s*\\[+\\s*(?:[^\\]]*\\.)?"?${escaped}"?\\s*\\]+`);
  const lines = source.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? "";
    if (header.test(line) || assignment.test(line)) {
      return i + 1;
    }
  }
  return undefined;
}
