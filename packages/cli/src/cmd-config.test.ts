/**
 * Tests for pile config command behavior.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { STD_LIB_DIR } from "@pile/std";
import { runConfig } from "./cmd-config.js";

interface Dirs {
  cwd: string;
  home: string;
}

async function captureConfig(
  setup: (dirs: Dirs) => void,
  json: boolean
): Promise<{ code: number; stdout: string; dirs: Dirs }> {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "pile-cli-config-test-"));
  const dirs = { cwd: path.join(root, "project"), home: path.join(root, "home") };
  fs.mkdirSync(dirs.cwd);
  fs.mkdirSync(dirs.home);
  setup(dirs);

  const out: string[] = [];
  const origLog = console.log;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));

  try {
    const code = await runConfig({ json, cwd: dirs.cwd, homeDir: dirs.home });
    return { code, stdout: out.join("\n"), dirs };
  } finally {
    console.log = origLog;
    fs.rmSync(root, { recursive: true, force: true });
  }
}

describe("pile config", () => {
  it("reports defaults when no config file exists", async () => {
    const result = await captureConfig(() => {}, false);
    assert.equal(result.code, 0);
    assert.equal(
      result.stdout,
      [
        "Effective Pile configuration",
        "  Source:          default",
        "  Path:            (none)",
        "  Import paths:    (none)",
        "  Max call depth:  1000",
        `  Standard lib:    ${STD_LIB_DIR}`,
      ].join("\n")
    );
  });

  it("reports the project file with resolved import paths", async () => {
    const result = await captureConfig((dirs) => {
      fs.writeFileSync(
        path.join(dirs.cwd, "pile.json"),
        JSON.stringify({ importPaths: ["lib", "vendor"], maxCallDepth: 64 })
      );
    }, true);
    assert.equal(result.code, 0);
    assert.deepEqual(JSON.parse(result.stdout), {
      source: "project",
      path: path.join(result.dirs.cwd, "pile.json"),
      config: {
        importPaths: [path.join(result.dirs.cwd, "lib"), path.join(result.dirs.cwd, "vendor")],
        maxCallDepth: 64,
      },
      stdLibDir: STD_LIB_DIR,
    });
  });

  it("falls back to the user config file", async () => {
    const result = await captureConfig((dirs) => {
      fs.mkdirSync(path.join(dirs.home, ".pile"));
      fs.writeFileSync(path.join(dirs.home, ".pile", "config.json"), JSON.stringify({ maxCallDepth: 20 }));
    }, false);
    const lines = result.stdout.split("\n");
    assert.equal(lines[1], "  Source:          user");
    assert.equal(lines[2], `  Path:            ${path.join(result.dirs.home, ".pile", "config.json")}`);
    assert.equal(lines[4], "  Max call depth:  20");
  });

  it("ignores an invalid project file", async () => {
    const result = await captureConfig((dirs) => {
      fs.writeFileSync(path.join(dirs.cwd, "pile.json"), JSON.stringify({ maxCallDepth: "deep" }));
    }, true);
    const parsed = JSON.parse(result.stdout);
    assert.equal(parsed.source, "default");
    assert.equal(parsed.path, null);
  });
});
