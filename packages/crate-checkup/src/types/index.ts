export type {
  Severity,
  Diagnostic,
  DiagnosticLocation,
  Report,
  ReportSummary,
} from "./diagnostics.js";

export type {
  CargoManifest,
  DependencyKind,
  DependencySpec,
  PackageSection,
} from "./manifest.js";

export type { ProjectContext, ProjectFile } from "./context.js";

export type {
  CheckCapability,
  CheckCategory,
  CheckConfig,
  CheckDefinition,
  CheckDescriptor,
  CheckFn,
  CheckRuntime,
  GeneralConfig,
  ProjectConfig,
} from "./checks.js";

export type {
  Advisory,
  AuditError,
  AuditErrorKind,
  AuditResult,
  AuditRunner,
  LookupClients,
  LookupError,
  LookupErrorKind,
  LookupResult,
  RegistryLookup,
} from "./lookups.js";

export type { DebugLogger, LogCategory } from "./logging.js";

export type { CheckOptions, OutputFormat } from "./cli-options.js";
