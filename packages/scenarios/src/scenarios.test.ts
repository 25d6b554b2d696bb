/**
 * Scenario-based black-box validation for the pile CLI.
 *
 * Discovers scenario folders, spawns the CLI as a subprocess,
 * and validates exit codes / stdout / stderr / trace / file artifacts.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as path from "node:path";
import * as crypto from "node:crypto";
import * as os from "node:os";
import { spawn } from "node:child_process";
import { fileURLToPath } from "node:url";

import type { ScenarioConfig } from "./types.js";
import { getScenarioRoots, selectScenarios } from "./discovery.js";
import type { LoadedScenario } from "./discovery.js";
import { parseTraceJsonl, computeTraceSummary } from "./normalize.js";
import { assertContainsAll, assertJsonSubset, assertMatchesRegex, parseJsonOrFail } from "./assertions.js";

// ---------------------------------------------------------------------------
// Path resolution (ESM-compatible)
// ---------------------------------------------------------------------------
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const CLI_PATH = path.resolve(__dirname, "../../cli/src/main.ts");
const REPO_ROOT = path.resolve(__dirname, "../../..");
// The CLI runs from its TypeScript sources; the child resolves the loader
// from here since its working directory is a temp dir.
const TSX_LOADER = import.meta.resolve("tsx");

const DEFAULT_TIMEOUT_MS = 20_000;

// ---------------------------------------------------------------------------
// File copy helper
// ---------------------------------------------------------------------------
function copyDirRecursive(src: string, dest: string): void {
  fs.mkdirSync(dest, { recursive: true });
  for (const entry of fs.readdirSync(src, { withFileTypes: true })) {
    const srcPath = path.join(src, entry.name);
    const destPath = path.join(dest, entry.name);
    if (entry.isDirectory()) {
      copyDirRecursive(srcPath, destPath);
    } else {
      fs.copyFileSync(srcPath, destPath);
    }
  }
}

function prepareWorkDir(scenario: LoadedScenario, workDir: string): void {
  for (const entry of fs.readdirSync(scenario.dir)) {
    if (entry === "scenario.json" || entry === "setup") continue;
    const src = path.join(scenario.dir, entry);
    const dest = path.join(workDir, entry);
    if (fs.statSync(src).isDirectory()) {
      copyDirRecursive(src, dest);
    } else {
      fs.copyFileSync(src, dest);
    }
  }

  const setupDir = path.join(scenario.dir, "setup");
  if (fs.existsSync(setupDir)) {
    copyDirRecursive(setupDir, workDir);
  }

  if (scenario.config.config) {
    fs.writeFileSync(path.join(workDir, "pile.json"), JSON.stringify(scenario.config.config));
  }
}

// ---------------------------------------------------------------------------
// Subprocess runner
// ---------------------------------------------------------------------------
interface RunResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

function runCli(args: string[], workDir: string, homeDir: string, config: ScenarioConfig): Promise<RunResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(process.execPath, ["--import", TSX_LOADER, CLI_PATH, ...args], {
      cwd: workDir,
      env: {
        HOME: homeDir,
        USERPROFILE: homeDir,
        PATH: process.env.PATH,
        SYSTEMROOT: process.env.SYSTEMROOT,
        PATHEXT: process.env.PATHEXT,
      },
      timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    child.stdout.on("data", (chunk: Buffer) => stdoutChunks.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderrChunks.push(chunk));

    // Always close stdin so programs reading input see end of input
    child.stdin.end(config.stdin ?? "");

    child.on("error", reject);
    child.on("close", (code) => {
      resolve({
        exitCode: code,
        stdout: Buffer.concat(stdoutChunks).toString("utf-8"),
        stderr: Buffer.concat(stderrChunks).toString("utf-8"),
      });
    });
  });
}

function normalizeLF(s: string): string {
  return s.replace(/\r\n/g, "\n");
}

// ---------------------------------------------------------------------------
// Expectations
// ---------------------------------------------------------------------------
function checkStream(
  label: string,
  actual: string,
  expected: {
    json?: unknown;
    jsonSubset?: unknown;
    text?: string;
    contains?: string;
    containsAll?: string[];
    regex?: string;
  }
): void {
  if (expected.text !== undefined) {
    assert.strictEqual(normalizeLF(actual).trimEnd(), normalizeLF(expected.text).trimEnd(), `${label} text mismatch`);
  }
  if (expected.json !== undefined) {
    assert.deepStrictEqual(parseJsonOrFail(actual, label), expected.json, `${label} JSON mismatch`);
  }
  if (expected.jsonSubset !== undefined) {
    assertJsonSubset(parseJsonOrFail(actual, label), expected.jsonSubset, label);
  }
  if (expected.contains !== undefined) {
    assert.ok(
      actual.includes(expected.contains),
      `${label} does not contain '${expected.contains}'.\nActual: ${actual}`
    );
  }
  if (expected.containsAll !== undefined) {
    assertContainsAll(actual, expected.containsAll, label);
  }
  if (expected.regex !== undefined) {
    assertMatchesRegex(actual, expected.regex, label);
  }
}

function checkFiles(scenario: LoadedScenario, workDir: string): void {
  for (const fa of scenario.config.expect.files ?? []) {
    const filePath = path.join(workDir, fa.path);
    const label = `file '${fa.path}' in scenario '${scenario.id}'`;

    if (fa.absent) {
      assert.equal(fs.existsSync(filePath), false, `Expected ${label} to be absent`);
      continue;
    }
    assert.ok(fs.existsSync(filePath), `Expected ${label} to exist`);

    if (fa.sha256 !== undefined) {
      const hash = crypto.createHash("sha256").update(fs.readFileSync(filePath)).digest("hex");
      assert.strictEqual(hash, fa.sha256, `SHA-256 mismatch for ${label}`);
    } else if (fa.text !== undefined) {
      const content = fs.readFileSync(filePath, "utf-8");
      assert.strictEqual(normalizeLF(content), normalizeLF(fa.text), `Text mismatch for ${label}`);
    } else if (fa.jsonSubset !== undefined) {
      assertJsonSubset(parseJsonOrFail(fs.readFileSync(filePath, "utf-8"), label), fa.jsonSubset, label);
    } else {
      const content = fs.readFileSync(filePath, "utf-8");
      assert.deepStrictEqual(parseJsonOrFail(content, label), fa.json, `JSON mismatch for ${label}`);
    }
  }
}

function checkTrace(scenario: LoadedScenario, workDir: string): void {
  const { traceSummary, traceSummarySubset } = scenario.config.expect;
  if (traceSummary === undefined && traceSummarySubset === undefined) return;

  const tracePath = path.join(workDir, "trace.jsonl");
  assert.ok(fs.existsSync(tracePath), `trace.jsonl not found for scenario '${scenario.id}'`);
  const summary = computeTraceSummary(parseTraceJsonl(fs.readFileSync(tracePath, "utf-8")));

  if (traceSummary !== undefined) {
    assert.deepStrictEqual(summary, traceSummary, `traceSummary mismatch for scenario '${scenario.id}'`);
  }
  if (traceSummarySubset !== undefined) {
    assertJsonSubset(summary, traceSummarySubset, `traceSummary of '${scenario.id}'`);
  }
}

// ---------------------------------------------------------------------------
// Main test suite
// ---------------------------------------------------------------------------
const scenarios = selectScenarios(getScenarioRoots(REPO_ROOT, process.env.PILE_SCENARIO_ROOTS), {
  text: process.env.PILE_SCENARIO_FILTER,
  tags: process.env.PILE_SCENARIO_TAGS,
});

describe("Pile CLI Scenarios", () => {
  if (scenarios.length === 0) {
    it("should have at least one scenario", () => {
      assert.fail("No scenario folders found");
    });
    return;
  }

  for (const scenario of scenarios) {
    it(`scenario: ${scenario.id}`, async () => {
      const { config } = scenario;
      const workDir = fs.mkdtempSync(path.join(os.tmpdir(), `pile-scenario-${scenario.id}-`));
      const homeDir = fs.mkdtempSync(path.join(os.tmpdir(), `pile-scenario-home-${scenario.id}-`));

      try {
        prepareWorkDir(scenario, workDir);

        const args = [...config.cmd];
        if (config.capture?.trace) {
          args.push("--trace", "trace.jsonl");
        }

        const result = await runCli(args, workDir, homeDir, config);

        assert.strictEqual(
          result.exitCode,
          config.expect.exitCode,
          `Exit code mismatch for scenario '${scenario.id}'.\n` + `stdout: ${result.stdout}\n` + `stderr: ${result.stderr}`
        );

        const e = config.expect;
        checkStream(`stdout of '${scenario.id}'`, result.stdout, {
          json: e.stdoutJson,
          jsonSubset: e.stdoutJsonSubset,
          text: e.stdoutText,
          contains: e.stdoutContains,
          containsAll: e.stdoutContainsAll,
          regex: e.stdoutRegex,
        });
        checkStream(`stderr of '${scenario.id}'`, result.stderr, {
          json: e.stderrJson,
          jsonSubset: e.stderrJsonSubset,
          text: e.stderrText,
          contains: e.stderrContains,
          containsAll: e.stderrContainsAll,
          regex: e.stderrRegex,
        });
        checkTrace(scenario, workDir);
        checkFiles(scenario, workDir);
      } finally {
        if (process.env.PILE_SCENARIO_KEEP_TMP !== "1") {
          fs.rmSync(workDir, { recursive: true, force: true });
          fs.rmSync(homeDir, { recursive: true, force: true });
        }
      }
    });
  }
});
