import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";

import {
  CONFIG_FILENAME,
  isCheckEnabled,
  locateKey,
  parseConfig,
  resolveConfig,
  timeoutSecsToMs,
} from "../../src/core/config.js";
import { ConfigError } from "../../src/core/errors.js";
import { cleanupTempDir, createTempDir } from "../helpers/project.js";

function expectConfigError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (error) {
    expect(error).toBeInstanceOf(ConfigError);
    if (error instanceof ConfigError) return error;
  }
  throw new Error("expected a ConfigError");
}

describe("isCheckEnabled", () => {
  it("defaults to enabled for codes the config does not name", () => {
    expect(isCheckEnabled({}, "CODE001")).toBe(true);
    expect(isCheckEnabled({ MD001: false }, "CODE001")).toBe(true);
  });

  it("respects explicit entries", () => {
    expect(isCheckEnabled({ CODE001: false }, "CODE001")).toBe(false);
    expect(isCheckEnabled({ CODE001: true }, "CODE001")).toBe(true);
  });
});

describe("parseConfig", () => {
  it("reads a [checks.enabled] table", () => {
    const config = parseConfig("[checks.enabled]\nCODE001 = false\nMD003 = true\n", "cfg.toml");
    expect(config.checks).toEqual({ CODE001: false, MD003: true });
    expect(config.general).toEqual({});
  });

  it("reads an inline enabled table", () => {
    const config = parseConfig("[checks]\nenabled = { DP002 = false }\n", "cfg.toml");
    expect(config.checks).toEqual({ DP002: false });
  });

  it("reads [general] options", () => {
    const config = parseConfig(
      "[general]\ntimeout_secs = 2.5\nconcurrency = 3\noffline = true\n",
      "cfg.toml",
    );
    expect(config.general).toEqual({ timeoutSecs: 2.5, concurrency: 3, offline: true });
  });

  it("treats an empty file as the default", () => {
    expect(parseConfig("", "cfg.toml")).toEqual({ checks: {}, general: {} });
  });

  it("reports malformed TOML with line and column", () => {
    const error = expectConfigError(() => parseConfig("[checks", "cfg.toml"));
    expect(error.file).toBe("cfg.toml");
    expect(error.line).toBe(1);
    expect(typeof error.column).toBe("number");
    expect(error.message).toMatch(/^Malformed TOML: /);
  });

  it("rejects unknown top-level sections by key path", () => {
    const error = expectConfigError(() =>
      parseConfig("[checks.enabled]\nMD001 = false\n\n[output]\ncolor = true\n", "cfg.toml"),
    );
    expect(error.keyPath).toBe("output");
    expect(error.line).toBe(4);
    expect(error.message).toBe("Unknown section 'output'");
  });

  it("rejects unknown keys inside [checks]", () => {
    const error = expectConfigError(() => parseConfig("[checks]\ndisabled = []\n", "cfg.toml"));
    expect(error.keyPath).toBe("checks.disabled");
    expect(error.line).toBe(2);
  });

  it("rejects unknown keys inside [general]", () => {
    const error = expectConfigError(() => parseConfig("[general]\nretries = 3\n", "cfg.toml"));
    expect(error.keyPath).toBe("general.retries");
    expect(error.message).toBe(
      "Unknown key 'retries' in [general], expected one of: timeout_secs, concurrency, offline",
    );
  });

  it("rejects non-boolean toggles", () => {
    const error = expectConfigError(() =>
      parseConfig('[checks.enabled]\nCODE001 = "no"\n', "cfg.toml"),
    );
    expect(error.keyPath).toBe("checks.enabled.CODE001");
    expect(error.line).toBe(2);
    expect(error.where).toBe("cfg.toml:2");
  });

  it.each([0.0001, 2_592_000])("rejects timeout_secs = %s", (secs) => {
    const error = expectConfigError(() =>
      parseConfig(`[general]\ntimeout_secs = ${secs}\n`, "cfg.toml"),
    );
    expect(error.keyPath).toBe("general.timeout_secs");
    expect(error.line).toBe(2);
    expect(error.message).toBe("'general.timeout_secs' must be a number between 0.001 and 2147483");
  });

  it("accepts timeout_secs at the timer limit", () => {
    const config = parseConfig("[general]\ntimeout_secs = 2147483\n", "cfg.toml");
    expect(config.general.timeoutSecs).toBe(2147483);
  });

  it("rejects a non-positive concurrency", () => {
    const error = expectConfigError(() => parseConfig("[general]\nconcurrency = 0\n", "cfg.toml"));
    expect(error.keyPath).toBe("general.concurrency");
  });
});

describe("timeoutSecsToMs", () => {
  it("rounds to whole milliseconds inside the timer range", () => {
    expect(timeoutSecsToMs(2.5)).toBe(2500);
    expect(timeoutSecsToMs(0.001)).toBe(1);
    expect(timeoutSecsToMs(2_147_483)).toBe(2_147_483_000);
  });

  it("returns null when the delay rounds to zero or overflows the timer", () => {
    expect(timeoutSecsToMs(0.0004)).toBeNull();
    expect(timeoutSecsToMs(0)).toBeNull();
    expect(timeoutSecsToMs(-1)).toBeNull();
    expect(timeoutSecsToMs(2_147_484)).toBeNull();
    expect(timeoutSecsToMs(Number.NaN)).toBeNull();
  });
});

describe("locateKey", () => {
  it("finds headers and assignments", () => {
    const source = "[checks]\nenabled = { A = 1 }\n[general]\noffline = 1\n";
    expect(locateKey(source, "general")).toBe(3);
    expect(locateKey(source, "general.offline")).toBe(4);
    expect(locateKey(source, "checks.enabled.A")).toBe(2);
    expect(locateKey(source, "missing")).toBeUndefined();
  });
});

describe("resolveConfig", () => {
  let tmpDir: string | undefined;

  afterEach(() => {
    if (tmpDir) cleanupTempDir(tmpDir);
    tmpDir = undefined;
  });

  it("returns the all-enabled default when the file is absent", () => {
    tmpDir = createTempDir();
    expect(resolveConfig(tmpDir)).toEqual({ checks: {}, general: {} });
  });

  it("returns the default and logs when the file cannot be read", () => {
    tmpDir = createTempDir();
    // a directory where the file should be makes the read fail with EISDIR
    fs.mkdirSync(path.join(tmpDir, CONFIG_FILENAME));
    const logger = { log: vi.fn() };

    expect(resolveConfig(tmpDir, logger)).toEqual({ checks: {}, general: {} });
    expect(logger.log).toHaveBeenCalledWith(
      "config",
      "config file unreadable, using defaults",
      expect.objectContaining({ file: path.join(tmpDir, CONFIG_FILENAME) }),
    );
  });

  it("loads the project file", () => {
    tmpDir = createTempDir();
    fs.writeFileSync(path.join(tmpDir, CONFIG_FILENAME), "[checks.enabled]\nLINT001 = false\n");
    expect(resolveConfig(tmpDir).checks).toEqual({ LINT001: false });
  });

  it("throws ConfigError naming the project file", () => {
    tmpDir = createTempDir();
    const file = path.join(tmpDir, CONFIG_FILENAME);
    fs.writeFileSync(file, "[nope]\n");
    const dir = tmpDir;
    const error = expectConfigError(() => resolveConfig(dir));
    expect(error.file).toBe(file);
    expect(error.keyPath).toBe("nope");
  });
});
