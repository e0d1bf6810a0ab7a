/**
 * Check registry: every built-in check, in the order results are reported.
 */

import { AUDIT_CHECKS } from "../checks/audit.js";
import { CODE_PATTERN_CHECKS } from "../checks/code-patterns.js";
import { DEPENDENCY_CHECKS } from "../checks/dependencies.js";
import { LINT_CHECKS } from "../checks/lints.js";
import { MANIFEST_CHECKS } from "../checks/manifest.js";
import { STRUCTURE_CHECKS } from "../checks/structure.js";

import type { CheckCategory, CheckDefinition } from "../types/index.js";

export const ALL_CHECKS: readonly CheckDefinition[] = Object.freeze([
  ...MANIFEST_CHECKS,
  ...DEPENDENCY_CHECKS,
  ...CODE_PATTERN_CHECKS,
  ...STRUCTURE_CHECKS,
  ...LINT_CHECKS,
  ...AUDIT_CHECKS,
]);

/** codes the executor itself emits */
export const ENGINE_CODES = {
  checkFault: "IO002",
  checkTimeout: "IO003",
} as const;

export function getCheckDefinition(code: string): CheckDefinition | undefined {
  return ALL_CHECKS.find((check) => check.code === code);
}

export function getChecksByCategory(category: CheckCategory): CheckDefinition[] {
  return ALL_CHECKS.filter((check) => check.category === category);
}

/** every code a run can emit: check codes, their degraded codes, and engine codes */
export function knownCodes(checks: readonly CheckDefinition[] = ALL_CHECKS): string[] {
  const codes = new Set<string>();
  for (const check of checks) {
    codes.add(check.code);
    for (const related of check.relatedCodes ?? []) codes.add(related);
  }
  codes.add(ENGINE_CODES.checkFault);
  codes.add(ENGINE_CODES.checkTimeout);
  return [...codes];
}
