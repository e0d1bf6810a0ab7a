import type { Diagnostic, DiagnosticLocation, Severity } from "../types/index.js";

export const SEVERITY_RANK: Record<Severity, number> = {
  error: 3,
  warning: 2,
  note: 1,
};

export interface DiagnosticInit {
  code: string;
  severity: Severity;
  message: string;
  location?: DiagnosticLocation;
  fixHint?: string;
}

export function createDiagnostic(init: DiagnosticInit): Diagnostic {
  const diagnostic: Diagnostic = {
    code: init.code,
    severity: init.severity,
    message: init.message,
    ...(init.location
      ? { location: Object.freeze({ ...init.location }) }
      : {}),
    ...(init.fixHint !== undefined ? { fixHint: init.fixHint } : {}),
  };
  return Object.freeze(diagnostic);
}
