import semver from "semver";

import { createDiagnostic } from "../core/diagnostic.js";
import { runPool } from "../core/pool.js";

import type {
  CheckDefinition,
  Diagnostic,
  DependencySpec,
} from "../types/index.js";

const REGISTRY_CONCURRENCY = 4;

const AT_MANIFEST = { file: "Cargo.toml" };

export function isWildcard(version: string): boolean {
  return version.includes("*");
}

/**
 * Translate a Cargo version requirement into an npm-style semver range.
 * A bare version is a caret requirement and comparators are comma separated.
 * Returns null when the result is not a valid range.
 */
export function cargoRequirementToRange(requirement: string): string | null {
  const comparators = requirement
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => (/^\d/.test(part) ? `^${part}` : part.replace(/^(\^|~|=|>=|<=|>|<)\s+/, "$1")));
  if (comparators.length === 0) return null;
  const range = comparators.join(" ");
  return semver.validRange(range) ? range : null;
}

/** lowest version a requirement admits, or null when it cannot be read */
export function minimumVersion(requirement: string): string | null {
  const range = cargoRequirementToRange(requirement);
  if (!range) return null;
  try {
    return semver.minVersion(range)?.version ?? null;
  } catch {
    return null;
  }
}

export const wildcardVersions: CheckDefinition = {
  code: "DP001",
  name: "Wildcard dependency versions",
  category: "dependency",
  capability: "pure",
  defaultSeverity: "warning",
  run: (context) =>
    (context.manifest?.dependencies ?? [])
      .filter((dep) => dep.version !== null && isWildcard(dep.version))
      .map((dep) =>
        createDiagnostic({
          code: "DP001",
          severity: "warning",
          message: `Wildcard version "${dep.version ?? "*"}" used for ${dep.kind} dependency '${dep.name}'. Specify a version range.`,
          location: AT_MANIFEST,
        }),
      ),
};

// only crates.io dependencies can be compared against crates.io
export function isFromCratesIo(dep: DependencySpec): boolean {
  return (
    dep.registry === undefined &&
    dep.git === undefined &&
    dep.path === undefined &&
    dep.workspace !== true
  );
}

export const outdatedDependencies: CheckDefinition = {
  code: "DP002",
  name: "Outdated dependencies",
  category: "dependency",
  capability: "network",
  defaultSeverity: "warning",
  relatedCodes: ["API001", "API002"],
  timeoutCode: "API002",
  run: async (context, runtime) => {
    const candidates: Array<{ dep: DependencySpec; minimum: string }> = [];
    for (const dep of context.manifest?.dependencies ?? []) {
      if (dep.version === null || isWildcard(dep.version)) continue;
      if (!isFromCratesIo(dep)) continue;
      const minimum = minimumVersion(dep.version);
      if (!minimum) {
        runtime.logger.log("check", "unreadable version requirement, skipped", {
          code: "DP002",
          dependency: dep.name,
          requirement: dep.version,
        });
        continue;
      }
      candidates.push({ dep, minimum });
    }

    // one slot per candidate keeps output in manifest order
    const results: Array<Diagnostic | null> = candidates.map(() => null);

    await runPool(candidates, REGISTRY_CONCURRENCY, async ({ dep, minimum }, index) => {
      if (runtime.signal.aborted) return;
      const lookup = await runtime.cache.latestVersion(
        runtime.lookups.registry,
        dep.name,
        runtime.signal,
      );

      if (!lookup.ok) {
        results[index] = createDiagnostic({
          code: "API001",
          severity: "warning",
          message: `Failed to fetch latest version for dependency '${dep.name}': ${lookup.error.message}`,
          location: AT_MANIFEST,
        });
        return;
      }

      const latest = semver.valid(lookup.version);
      if (latest && semver.lt(minimum, latest)) {
        results[index] = createDiagnostic({
          code: "DP002",
          severity: "warning",
          message: `Dependency '${dep.name}' is outdated. Current: ${dep.version ?? minimum}, Latest: ${latest}`,
          location: AT_MANIFEST,
          fixHint: `${dep.name} = "${latest}"`,
        });
      }
    });

    return results.filter((d): d is Diagnostic => d !== null);
  },
};

export const DEPENDENCY_CHECKS: CheckDefinition[] = [wildcardVersions, outdatedDependencies];
