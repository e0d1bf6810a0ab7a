import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";

import {
  debugMacros,
  expectUsage,
  pendingWorkComments,
  unreadableSources,
  unwrapUsage,
} from "../../src/checks/code-patterns.js";
import { buildProjectContext } from "../../src/core/context.js";
import { RunCache } from "../../src/core/run-cache.js";
import { CLEAN_MANIFEST, cleanupTempDir, makeContext, makeRuntime, writeProject } from "../helpers/project.js";

const LIB = `pub fn parse(s: &str) -> u32 {
    let n = s.parse().unwrap();
    let m = s.parse::<u32>().expect ("number");
    println!("parsed {}", n);
    // TODO: handle overflow
    n + m
}
`;

const MAIN = `fn main() {
    let v = std::env::args().nth(1).unwrap();
    dbg!(&v);
    // FIXME later
}
`;

describe("code pattern checks", () => {
  let root: string | undefined;

  afterEach(() => {
    if (root) cleanupTempDir(root);
    root = undefined;
  });

  async function project(files: Record<string, string>) {
    root = writeProject({ "Cargo.toml": CLEAN_MANIFEST, ...files });
    return buildProjectContext(root);
  }

  it("CODE001 flags unwrap in library code only", async () => {
    const context = await project({
      "src/lib.rs": LIB,
      "src/main.rs": MAIN,
      "build.rs": "fn main() { x.unwrap(); }\n",
      "src/bin/tool.rs": "fn main() { y.unwrap(); }\n",
    });

    const result = await unwrapUsage.run(context, makeRuntime());
    expect(result).toEqual([
      {
        code: "CODE001",
        severity: "warning",
        message: "'.unwrap()' used in library context. Consider using '?' or pattern matching.",
        location: { file: "src/lib.rs", line: 2 },
        fixHint: "Propagate the error with '?' or handle the None/Err case",
      },
    ]);
  });

  it("CODE002 flags expect with optional whitespace", async () => {
    const context = await project({ "src/lib.rs": LIB });
    const result = await expectUsage.run(context, makeRuntime());
    expect(result.map((d) => [d.code, d.severity, d.location?.line])).toEqual([
      ["CODE002", "note", 3],
    ]);
  });

  it("CODE003 names the macro it found", async () => {
    const context = await project({
      "src/lib.rs": LIB,
      "src/util.rs": "pub fn f(x: u8) -> u8 { dbg!(x) }\n",
      "src/main.rs": MAIN,
    });
    const result = await debugMacros.run(context, makeRuntime());
    expect(result.map((d) => `${d.location?.file}:${d.location?.line} ${d.message}`)).toEqual([
      "src/lib.rs:4 Diagnostic macro (println!) found in library context. Remove before release.",
      "src/util.rs:1 Diagnostic macro (dbg!) found in library context. Remove before release.",
    ]);
  });

  it("CODE004 scans every Rust source, binaries and tests included", async () => {
    const context = await project({
      "src/lib.rs": LIB,
      "src/main.rs": MAIN,
      "tests/it.rs": "// XXX flaky\n#[test]\nfn t() {}\n",
      "notes.md": "// TODO not rust\n",
    });
    const result = await pendingWorkComments.run(context, makeRuntime());
    expect(result.map((d) => `${d.location?.file}:${d.location?.line} ${d.message}`)).toEqual([
      "src/lib.rs:5 Found 'TODO' comment. Address or create an issue for it.",
      "src/main.rs:4 Found 'FIXME' comment. Address or create an issue for it.",
      "tests/it.rs:1 Found 'XXX' comment. Address or create an issue for it.",
    ]);
  });

  it("checks share one read per file through the run cache", async () => {
    const context = await project({ "src/lib.rs": LIB });
    const runtime = makeRuntime({ cache: new RunCache() });

    await unwrapUsage.run(context, runtime);
    // later edits are invisible within the same run
    fs.writeFileSync(path.join(context.root, "src/lib.rs"), "pub fn clean() {}\n");
    const second = await unwrapUsage.run(context, runtime);
    expect(second).toHaveLength(1);
  });
});

describe("IO001 unreadable sources", () => {
  it("reports each unreadable Rust file once and lets the scanners skip it", async () => {
    const context = makeContext({
      root: "/nonexistent/crate-checkup-io",
      files: ["Cargo.toml", "src/lib.rs", "src/parse.rs"],
    });
    const runtime = makeRuntime();

    const io = await unreadableSources.run(context, runtime);
    expect(io.map((d) => [d.code, d.severity, d.location?.file])).toEqual([
      ["IO001", "warning", "src/lib.rs"],
      ["IO001", "warning", "src/parse.rs"],
    ]);
    expect(io[0]?.message).toMatch(/^Failed to read file src\/lib\.rs: ENOENT/);

    expect(await unwrapUsage.run(context, runtime)).toEqual([]);
  });
});
