import * as fs from "node:fs";
import * as path from "node:path";

import { ContextError } from "./errors.js";
import { scanFileTree } from "./file-tree.js";
import { MANIFEST_FILENAME, parseManifest } from "./manifest.js";

import type { CargoManifest, DebugLogger, ProjectContext } from "../types/index.js";

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Load everything the checks read: the parsed manifest and the classified file tree.
 *
 * Throws {@link ContextError} when the root is not a directory or has no
 * `Cargo.toml`. An unparseable manifest is not fatal; it is carried in
 * `manifestError` instead.
 */
export async function buildProjectContext(
  projectPath: string,
  logger?: DebugLogger,
): Promise<ProjectContext> {
  const root = path.resolve(projectPath);

  let stat: fs.Stats;
  try {
    stat = fs.statSync(root);
  } catch {
    throw new ContextError(`Project path does not exist: ${root}`, root);
  }
  if (!stat.isDirectory()) {
    throw new ContextError(`Project path is not a directory: ${root}`, root);
  }

  const manifestPath = path.join(root, MANIFEST_FILENAME);
  let source: string;
  try {
    source = fs.readFileSync(manifestPath, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ContextError(`No readable ${MANIFEST_FILENAME} in ${root}: ${reason}`, root);
  }

  const parsed = parseManifest(source);
  let manifest: CargoManifest | null = null;
  let manifestError: string | null = null;
  if (parsed.ok) {
    manifest = parsed.manifest;
  } else {
    manifestError = parsed.error;
    logger?.log("context", "manifest parse failed", { error: parsed.error });
  }

  const tree = await scanFileTree(root, manifest);
  logger?.log("context", "project scanned", {
    root,
    files: tree.files.length,
    directories: tree.directories.length,
  });

  return deepFreeze({
    root,
    manifestPath,
    manifest,
    manifestError,
    files: tree.files,
    directories: tree.directories,
  });
}
