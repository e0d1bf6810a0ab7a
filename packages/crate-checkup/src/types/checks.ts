import type { ProjectContext } from "./context.js";
import type { Diagnostic, Severity } from "./diagnostics.js";
import type { DebugLogger } from "./logging.js";
import type { LookupClients } from "./lookups.js";
import type { RunCache } from "../core/run-cache.js";

export type CheckCapability = "pure" | "file-scan" | "network" | "subprocess";

export type CheckCategory =
  | "manifest"
  | "dependency"
  | "code-pattern"
  | "security"
  | "structure"
  | "lint-config"
  | "api"
  | "io";

export interface CheckDescriptor {
  code: string;
  name: string;
  category: CheckCategory;
  capability: CheckCapability;
  defaultSeverity: Severity;
  /** codes this check emits when its input source is degraded */
  relatedCodes?: string[];
  /** code recorded when the executor gives up waiting; defaults to IO003 */
  timeoutCode?: string;
}

export interface CheckRuntime {
  lookups: LookupClients;
  cache: RunCache;
  signal: AbortSignal;
  logger: DebugLogger;
}

export type CheckFn = (
  context: ProjectContext,
  runtime: CheckRuntime,
) => Diagnostic[] | Promise<Diagnostic[]>;

export interface CheckDefinition extends CheckDescriptor {
  run: CheckFn;
}

export type CheckConfig = Record<string, boolean>;

export interface GeneralConfig {
  timeoutSecs?: number;
  concurrency?: number;
  offline?: boolean;
}

export interface ProjectConfig {
  checks: CheckConfig;
  general: GeneralConfig;
}
