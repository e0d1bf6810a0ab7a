import { createDiagnostic } from "../core/diagnostic.js";

import type {
  AuditErrorKind,
  CheckDefinition,
  DiagnosticLocation,
} from "../types/index.js";

const AUDIT_FAILURES: Record<AuditErrorKind, { code: string; summary: string }> = {
  "binary-missing": {
    code: "AUD001",
    summary: "'cargo' was not found on PATH; vulnerability audit skipped",
  },
  "tool-missing": {
    code: "AUD002",
    summary: "cargo-audit is not installed (cargo install cargo-audit); vulnerability audit skipped",
  },
  timeout: {
    code: "AUD003",
    summary: "cargo audit timed out; vulnerability audit incomplete",
  },
  unparseable: {
    code: "AUD004",
    summary: "cargo audit output could not be parsed",
  },
};

export function auditFailureCode(kind: AuditErrorKind): string {
  return AUDIT_FAILURES[kind].code;
}

export const vulnerabilityAudit: CheckDefinition = {
  code: "SEC001",
  name: "Known vulnerabilities (cargo audit)",
  category: "security",
  capability: "subprocess",
  defaultSeverity: "error",
  relatedCodes: ["AUD001", "AUD002", "AUD003", "AUD004"],
  timeoutCode: "AUD003",
  run: async (context, runtime) => {
    const location: DiagnosticLocation | undefined = context.files.some(
      (f) => f.path === "Cargo.lock",
    )
      ? { file: "Cargo.lock" }
      : undefined;

    const result = await runtime.lookups.audit.run(context.root, runtime.signal);

    if (!result.ok) {
      const failure = AUDIT_FAILURES[result.error.kind];
      runtime.logger.log("audit", "audit degraded", {
        kind: result.error.kind,
        error: result.error.message,
      });
      return [
        createDiagnostic({
          code: failure.code,
          severity: "warning",
          message: `${failure.summary}: ${result.error.message}`,
          ...(location ? { location } : {}),
        }),
      ];
    }

    return result.advisories.map((advisory) => {
      const version = advisory.packageVersion ? ` ${advisory.packageVersion}` : "";
      return createDiagnostic({
        code: "SEC001",
        severity: "error",
        message: `Vulnerability found in '${advisory.packageName}${version}': ${advisory.title} (ID: ${advisory.advisoryId})`,
        ...(location ? { location } : {}),
        fixHint:
          advisory.patched.length > 0
            ? `Upgrade ${advisory.packageName} to ${advisory.patched.join(" or ")}`
            : `No patched release of ${advisory.packageName}; consider an alternative crate`,
      });
    });
  },
};

export const AUDIT_CHECKS: CheckDefinition[] = [vulnerabilityAudit];
