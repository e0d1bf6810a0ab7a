import * as fs from "node:fs/promises";
import * as path from "node:path";

import type { LookupResult, RegistryLookup } from "../types/index.js";

export type SourceRead =
  | { ok: true; text: string }
  | { ok: false; error: string };

/**
 * Memoizes registry lookups and source-file reads for a single run, so that
 * checks sharing an input touch it once.
 */
export class RunCache {
  private versions = new Map<string, Promise<LookupResult>>();
  private sources = new Map<string, Promise<SourceRead>>();

  latestVersion(
    registry: RegistryLookup,
    packageName: string,
    signal?: AbortSignal,
  ): Promise<LookupResult> {
    let pending = this.versions.get(packageName);
    if (!pending) {
      pending = registry.latestVersion(packageName, signal);
      this.versions.set(packageName, pending);
    }
    return pending;
  }

  readSource(root: string, relPath: string): Promise<SourceRead> {
    let pending = this.sources.get(relPath);
    if (!pending) {
      pending = fs
        .readFile(path.join(root, relPath), "utf8")
        .then(
          (text): SourceRead => ({ ok: true, text }),
          (error: unknown): SourceRead => ({
            ok: false,
            error: error instanceof Error ? error.message : String(error),
          }),
        );
      this.sources.set(relPath, pending);
    }
    return pending;
  }
}
