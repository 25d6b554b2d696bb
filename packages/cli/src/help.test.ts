/**
 * Tests for Pile CLI help content.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { createRequire } from "node:module";
import { QUICKREF, TOPICS, TOPIC_LIST } from "./help-content.js";
import { runHelp } from "./cmd-help.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

function captureHelp(
  topic?: string,
  opts: { index?: boolean } = {}
): { stdout: string; stderr: string; exitCode: number | undefined } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  const prevExitCode = process.exitCode;

  process.exitCode = undefined;
  console.log = (...args: unknown[]) => {
    stdout.push(args.map(String).join(" "));
  };
  console.error = (...args: unknown[]) => {
    stderr.push(args.map(String).join(" "));
  };

  try {
    runHelp(topic, opts);
    return {
      stdout: stdout.join("\n"),
      stderr: stderr.join("\n"),
      exitCode: typeof process.exitCode === "number" ? process.exitCode : undefined,
    };
  } finally {
    console.log = origLog;
    console.error = origError;
    process.exitCode = prevExitCode;
  }
}

describe("Pile CLI Help Content", () => {
  it("QUICKREF contains version matching package.json", () => {
    const expectedVersion = `v${pkg.version.replace(/\.\d+$/, "")}`;
    assert.ok(
      QUICKREF.includes(expectedVersion),
      `Expected QUICKREF to contain '${expectedVersion}', got: ${QUICKREF.slice(0, 100)}`
    );
  });

  it("QUICKREF lists every help topic as an indented command", () => {
    assert.ok(QUICKREF.includes("HELP TOPICS"));
    for (const topic of TOPIC_LIST) {
      assert.ok(QUICKREF.includes(`  pile help ${topic}\n`), `QUICKREF does not list '${topic}'`);
    }
    assert.ok(QUICKREF.includes("  pile help stdlib --index"));
  });

  it("TOPICS has expected keys", () => {
    assert.deepEqual(TOPIC_LIST, ["syntax", "stack", "flow", "names", "builtins", "imports", "errors", "stdlib"]);
  });

  it("each topic value is a non-empty string", () => {
    for (const [key, value] of Object.entries(TOPICS)) {
      assert.ok(value.length > 0, `Topic '${key}' is empty`);
    }
  });

  it("stack topic documents operand order", () => {
    assert.ok(TOPICS.stack.includes("2 10 /   -> 5"));
    assert.ok(TOPICS.stack.includes("45 5 12 rot -> 5 12 45"));
  });

  it("errors topic lists every exit-code group", () => {
    for (const code of ["E_LEX", "E_PARSE", "E_CYCLIC_IMPORT", "E_STACK_UNDERFLOW", "E_RECURSION_LIMIT", "E_IO", "E_RUNTIME"]) {
      assert.ok(TOPICS.errors.includes(code), `errors topic does not mention ${code}`);
    }
  });

  it("stdlib topic names every standard library unit", () => {
    assert.ok(TOPICS.stdlib.includes(`import "math"`));
    assert.ok(TOPICS.stdlib.includes(`import "seq"`));
    assert.ok(TOPICS.stdlib.includes(`import "str"`));
  });

  it("runHelp prints the quick reference without a topic", () => {
    const result = captureHelp();
    assert.equal(result.stdout, QUICKREF);
    assert.equal(result.exitCode, undefined);
  });

  it("runHelp supports unique prefix matching", () => {
    const result = captureHelp("bui");
    assert.equal(result.stdout, TOPICS.builtins);
    assert.equal(result.stderr, "");
    assert.equal(result.exitCode, undefined);
  });

  it("runHelp treats topics case-insensitively", () => {
    const result = captureHelp("FLOW");
    assert.equal(result.stdout, TOPICS.flow);
  });

  it("runHelp rejects ambiguous prefixes", () => {
    // "s" matches syntax, stack and stdlib
    const result = captureHelp("s");
    assert.equal(result.exitCode, 1);
    assert.ok(result.stderr.startsWith(`Unknown help topic: "s"`));
  });

  it("runHelp prints stdlib index with --index", () => {
    const result = captureHelp("stdlib", { index: true });
    const lines = result.stdout.split("\n");
    assert.equal(lines[0], "PILE STDLIB INDEX");
    assert.equal(lines[3], `import "math"`);
    assert.equal(lines[4], "   1. abs               n abs -> |n|");
    assert.ok(lines.includes(`import "seq"`));
    assert.ok(lines.includes("  15. starts_with       text prefix starts_with -> true when text begins with prefix"));
    assert.ok(lines.includes("Total: 15"));
    assert.equal(result.stderr, "");
    assert.equal(result.exitCode, undefined);
  });

  it("runHelp rejects --index for non-stdlib topics", () => {
    const result = captureHelp("flow", { index: true });
    assert.equal(result.exitCode, 1);
    assert.ok(result.stderr.includes("only supported with the stdlib topic"));
    assert.ok(result.stderr.includes("Usage:"));
    assert.ok(result.stderr.includes("  pile help stdlib --index"));
  });

  it("runHelp rejects --index when no topic is provided", () => {
    const result = captureHelp(undefined, { index: true });
    assert.equal(result.exitCode, 1);
    assert.ok(result.stderr.includes("only supported with the stdlib topic"));
  });

  it("runHelp sets exit code 1 for unknown topic", () => {
    const result = captureHelp("no-such-topic");
    assert.equal(result.exitCode, 1);
    assert.ok(result.stderr.includes("Unknown help topic"));
    assert.ok(result.stderr.includes("Available topics:"));
    assert.ok(result.stderr.includes("  - syntax"));
    assert.ok(result.stderr.includes("  pile help <topic>"));
  });

  it("runHelp rejects prototype property names as topics", () => {
    const constructorResult = captureHelp("constructor");
    assert.equal(constructorResult.exitCode, 1);
    assert.ok(constructorResult.stderr.includes("Unknown help topic"));

    const protoResult = captureHelp("__proto__");
    assert.equal(protoResult.exitCode, 1);
    assert.ok(protoResult.stderr.includes("Unknown help topic"));
  });
});
