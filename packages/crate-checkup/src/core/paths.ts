import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

const PACKAGE_NAME = "crate-checkup";

let _packageRoot: string | null = null;

// walk up from this module until the package's own package.json;
// works from src/core and from dist/core alike
export function getPackageRoot(): string {
  if (_packageRoot) return _packageRoot;

  let dir = path.dirname(fileURLToPath(import.meta.url));
  while (true) {
    const pkgJsonPath = path.join(dir, "package.json");
    if (fs.existsSync(pkgJsonPath)) {
      try {
        const pkg: unknown = JSON.parse(fs.readFileSync(pkgJsonPath, "utf8"));
        if (typeof pkg === "object" && pkg !== null && "name" in pkg && pkg.name === PACKAGE_NAME) {
          _packageRoot = dir;
          return dir;
        }
      } catch {
        // malformed package.json, keep walking
      }
    }
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  throw new Error(`Could not find ${PACKAGE_NAME} package root`);
}

export function getPackageVersion(): string {
  const raw = fs.readFileSync(path.join(getPackageRoot(), "package.json"), "utf8");
  const pkg: unknown = JSON.parse(raw);
  return typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";
}
