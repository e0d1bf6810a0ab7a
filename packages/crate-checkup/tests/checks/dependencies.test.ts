import { describe, expect, it } from "vitest";

import {
  cargoRequirementToRange,
  minimumVersion,
  outdatedDependencies,
  wildcardVersions,
} from "../../src/checks/dependencies.js";
import {
  makeContext,
  makeManifest,
  makeRuntime,
  stubLookups,
  stubRegistry,
} from "../helpers/project.js";

import type { DependencySpec, RegistryLookup } from "../../src/types/index.js";

function contextWith(dependencies: DependencySpec[]) {
  return makeContext({ manifest: makeManifest({ dependencies }) });
}

describe("cargoRequirementToRange", () => {
  it("reads bare versions as caret requirements", () => {
    expect(cargoRequirementToRange("1.2")).toBe("^1.2");
    expect(cargoRequirementToRange("0.3.1")).toBe("^0.3.1");
  });

  it("joins comma-separated comparators", () => {
    expect(cargoRequirementToRange(">= 1.2, < 2")).toBe(">=1.2 <2");
  });

  it("keeps explicit operators", () => {
    expect(cargoRequirementToRange("~1.4")).toBe("~1.4");
    expect(cargoRequirementToRange("=1.0.7")).toBe("=1.0.7");
  });

  it("returns null for nonsense", () => {
    expect(cargoRequirementToRange("latest")).toBeNull();
    expect(cargoRequirementToRange("")).toBeNull();
  });
});

describe("minimumVersion", () => {
  it("takes the lowest admitted version", () => {
    expect(minimumVersion("1.2")).toBe("1.2.0");
    expect(minimumVersion(">=0.9, <2")).toBe("0.9.0");
    expect(minimumVersion("=1.0.7")).toBe("1.0.7");
    expect(minimumVersion("latest")).toBeNull();
  });
});

describe("DP001 wildcard versions", () => {
  it("flags wildcard requirements of every kind, without the network", () => {
    const registry = stubRegistry({});
    const context = contextWith([
      { name: "serde", kind: "runtime", version: "*" },
      { name: "rand", kind: "dev", version: "0.8.*" },
      { name: "cc", kind: "build", version: "1.0" },
      { name: "local", kind: "runtime", version: null, path: "../local" },
    ]);

    const result = wildcardVersions.run(context, makeRuntime({ lookups: stubLookups({ registry }) }));
    expect(result).toEqual([
      {
        code: "DP001",
        severity: "warning",
        message: `Wildcard version "*" used for runtime dependency 'serde'. Specify a version range.`,
        location: { file: "Cargo.toml" },
      },
      {
        code: "DP001",
        severity: "warning",
        message: `Wildcard version "0.8.*" used for dev dependency 'rand'. Specify a version range.`,
        location: { file: "Cargo.toml" },
      },
    ]);
    expect(registry.calls).toEqual([]);
  });
});

describe("DP002 outdated dependencies", () => {
  it("warns when the requirement's minimum is older than the latest release", async () => {
    const registry = stubRegistry({ serde: "1.0.210", tokio: "1.40.0" });
    const context = contextWith([
      { name: "serde", kind: "runtime", version: "1.0.100" },
      { name: "tokio", kind: "runtime", version: "1.40" },
    ]);

    const result = await outdatedDependencies.run(
      context,
      makeRuntime({ lookups: stubLookups({ registry }) }),
    );

    expect(result).toEqual([
      {
        code: "DP002",
        severity: "warning",
        message: "Dependency 'serde' is outdated. Current: 1.0.100, Latest: 1.0.210",
        location: { file: "Cargo.toml" },
        fixHint: 'serde = "1.0.210"',
      },
    ]);
  });

  it("skips wildcards, versionless path deps and unreadable requirements", async () => {
    const registry = stubRegistry({ serde: "2.0.0", local: "9.0.0", odd: "9.0.0" });
    const context = contextWith([
      { name: "serde", kind: "runtime", version: "*" },
      { name: "local", kind: "runtime", version: null, path: "../local" },
      { name: "odd", kind: "runtime", version: "latest" },
    ]);

    const result = await outdatedDependencies.run(
      context,
      makeRuntime({ lookups: stubLookups({ registry }) }),
    );
    expect(result).toEqual([]);
    expect(registry.calls).toEqual([]);
  });

  it("leaves registry, git and path dependencies out of crates.io lookups", async () => {
    const registry = stubRegistry({
      internal: "9.0.0",
      forked: "9.0.0",
      sibling: "9.0.0",
      serde: "1.0.0",
    });
    const context = contextWith([
      { name: "internal", kind: "runtime", version: "1.0", registry: "corp" },
      { name: "forked", kind: "runtime", version: "0.3", git: "https://example.com/forked.git" },
      { name: "sibling", kind: "dev", version: "0.1", path: "../sibling" },
      { name: "serde", kind: "runtime", version: "1.0" },
    ]);

    const result = await outdatedDependencies.run(
      context,
      makeRuntime({ lookups: stubLookups({ registry }) }),
    );
    expect(result).toEqual([]);
    expect(registry.calls).toEqual(["serde"]);
  });

  it("emits one API001 warning per dependency whose lookup fails", async () => {
    const registry = stubRegistry({
      serde: { ok: false, error: { kind: "network", message: "connect ECONNREFUSED" } },
      rand: "0.8.5",
    });
    const context = contextWith([
      { name: "serde", kind: "runtime", version: "1.0" },
      { name: "missing-crate", kind: "dev", version: "0.1" },
      { name: "rand", kind: "runtime", version: "0.8.5" },
    ]);

    const result = await outdatedDependencies.run(
      context,
      makeRuntime({ lookups: stubLookups({ registry }) }),
    );

    expect(result).toEqual([
      {
        code: "API001",
        severity: "warning",
        message: "Failed to fetch latest version for dependency 'serde': connect ECONNREFUSED",
        location: { file: "Cargo.toml" },
      },
      {
        code: "API001",
        severity: "warning",
        message:
          "Failed to fetch latest version for dependency 'missing-crate': crate 'missing-crate' is not published on crates.io",
        location: { file: "Cargo.toml" },
      },
    ]);
    expect(result.every((d) => d.severity !== "error")).toBe(true);
  });

  it("looks up a crate once even when it appears in several tables", async () => {
    const registry = stubRegistry({ serde: "1.0.0" });
    const context = contextWith([
      { name: "serde", kind: "runtime", version: "1.0" },
      { name: "serde", kind: "dev", version: "1.0" },
    ]);

    await outdatedDependencies.run(context, makeRuntime({ lookups: stubLookups({ registry }) }));
    expect(registry.calls).toEqual(["serde"]);
  });

  it("keeps at most four lookups in flight", async () => {
    let active = 0;
    let peak = 0;
    const registry: RegistryLookup = {
      async latestVersion() {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active--;
        return { ok: true, version: "1.0.0" };
      },
    };
    const context = contextWith(
      Array.from({ length: 10 }, (_, i) => ({
        name: `crate-${i}`,
        kind: "runtime" as const,
        version: "1.0",
      })),
    );

    await outdatedDependencies.run(context, makeRuntime({ lookups: stubLookups({ registry }) }));
    expect(peak).toBe(4);
  });

  it("stops issuing lookups once its signal is aborted", async () => {
    const registry = stubRegistry({ serde: "2.0.0" });
    const controller = new AbortController();
    controller.abort();
    const context = contextWith([{ name: "serde", kind: "runtime", version: "1.0" }]);

    const result = await outdatedDependencies.run(
      context,
      makeRuntime({ lookups: stubLookups({ registry }), signal: controller.signal }),
    );
    expect(result).toEqual([]);
    expect(registry.calls).toEqual([]);
  });
});
