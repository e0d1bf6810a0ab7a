export { execute, DEFAULT_TIMEOUT_MS } from "./core/executor.js";
export type { ExecuteOptions } from "./core/executor.js";
export { buildProjectContext } from "./core/context.js";
export { resolveConfig, parseConfig, isCheckEnabled, CONFIG_FILENAME } from "./core/config.js";
export { parseManifest } from "./core/manifest.js";
export { buildReport, sortDiagnostics, exitCodeFor } from "./core/report.js";
export { createDiagnostic, SEVERITY_RANK } from "./core/diagnostic.js";
export { ContextError, ConfigError, CheckTimeoutError } from "./core/errors.js";
export { ALL_CHECKS, ENGINE_CODES, getCheckDefinition, getChecksByCategory } from "./core/registry.js";
export { RunCache } from "./core/run-cache.js";
export { createLogger, createNoopLogger } from "./core/debug-logger.js";
export { CratesIoRegistry } from "./lookups/crates-io.js";
export { CargoAuditRunner, parseAuditOutput } from "./lookups/cargo-audit.js";
export { formatReportJson } from "./formatters/json.js";
export { formatReportHuman } from "./formatters/human.js";

export type * from "./types/index.js";
