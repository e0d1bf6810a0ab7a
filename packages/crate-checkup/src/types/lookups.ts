export type LookupErrorKind = "network" | "not-found" | "malformed";

export interface LookupError {
  kind: LookupErrorKind;
  message: string;
}

export type LookupResult =
  | { ok: true; version: string }
  | { ok: false; error: LookupError };

export interface RegistryLookup {
  latestVersion(packageName: string, signal?: AbortSignal): Promise<LookupResult>;
}

export interface Advisory {
  packageName: string;
  packageVersion?: string;
  advisoryId: string;
  title: string;
  severity?: string;
  patched: string[];
}

export type AuditErrorKind = "binary-missing" | "tool-missing" | "timeout" | "unparseable";

export interface AuditError {
  kind: AuditErrorKind;
  message: string;
}

export type AuditResult =
  | { ok: true; advisories: Advisory[] }
  | { ok: false; error: AuditError };

export interface AuditRunner {
  run(projectRoot: string, signal?: AbortSignal): Promise<AuditResult>;
}

export interface LookupClients {
  registry: RegistryLookup;
  audit: AuditRunner;
}
