/**
 * Tests for pile check command behavior.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runCheck } from "./cmd-check.js";

async function captureCheck(
  files: Record<string, string>,
  opts: { pretty?: boolean; import?: string[] } = {}
): Promise<{ code: number; stdout: string; stderr: string }> {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "pile-cli-check-test-"));
  for (const [name, text] of Object.entries(files)) {
    const filePath = path.join(tmpDir, name);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, text, "utf-8");
  }

  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const code = await runCheck(path.join(tmpDir, "main.pile"), { ...opts, cwd: tmpDir, homeDir: tmpDir });
    return { code, stdout: out.join("\n"), stderr: err.join("\n") };
  } finally {
    console.log = origLog;
    console.error = origError;
    fs.rmSync(tmpDir, { recursive: true, force: true });
  }
}

describe("pile check", () => {
  it("prints [] on success by default", async () => {
    const result = await captureCheck({ "main.pile": `proc f 1 end\nf println\n` });
    assert.equal(result.code, 0);
    assert.equal(result.stdout, "[]");
    assert.equal(result.stderr, "");
  });

  it("prints a human summary with --pretty", async () => {
    const result = await captureCheck({ "main.pile": `1 println\n` }, { pretty: true });
    assert.equal(result.code, 0);
    assert.equal(result.stdout, "No errors found.");
  });

  it("does not run the program", async () => {
    const result = await captureCheck({ "main.pile": `"side effect" println 0 1 /\n` });
    assert.equal(result.code, 0);
    assert.equal(result.stdout, "[]");
  });

  it("returns 2 with a JSON diagnostic array on parse errors", async () => {
    const result = await captureCheck({ "main.pile": `1 if 2\n` });
    assert.equal(result.code, 2);
    assert.equal(result.stdout, "");
    const diags = JSON.parse(result.stderr);
    assert.equal(diags.length, 1);
    assert.equal(diags[0].code, "E_PARSE");
    assert.equal(diags[0].message, "expected 'end' to close 'if' but found end of file");
  });

  it("returns 2 on structural errors", async () => {
    const result = await captureCheck({ "main.pile": `break\n` });
    assert.equal(result.code, 2);
    const diags = JSON.parse(result.stderr);
    assert.equal(diags[0].code, "E_BREAK_OUTSIDE_LOOP");
    assert.equal(diags[0].message, "'break' outside of a loop");
  });

  it("returns 2 on lex errors", async () => {
    const result = await captureCheck({ "main.pile": `1.2.3\n` });
    assert.equal(result.code, 2);
    assert.equal(JSON.parse(result.stderr)[0].code, "E_LEX");
  });

  it("returns 3 on bind errors", async () => {
    const result = await captureCheck({
      "main.pile": `import "b"\n`,
      "b.pile": `import "main"\n`,
    });
    assert.equal(result.code, 3);
    const diags = JSON.parse(result.stderr);
    assert.equal(diags[0].code, "E_CYCLIC_IMPORT");
  });

  it("returns 3 when an import cannot be found", async () => {
    const result = await captureCheck({ "main.pile": `import "nowhere"\n` });
    assert.equal(result.code, 3);
    assert.equal(JSON.parse(result.stderr)[0].code, "E_IMPORT_NOT_FOUND");
  });

  it("searches -I directories", async () => {
    const result = await captureCheck(
      {
        "main.pile": `import "helpers"\nhelp\n`,
        "extra/helpers.pile": `proc help end\n`,
      },
      { import: ["extra"] }
    );
    assert.equal(result.code, 0);
    assert.equal(result.stdout, "[]");
  });

  it("prints pretty diagnostics with location and hint", async () => {
    const result = await captureCheck({ "main.pile": `1 2\ncontinue\n` }, { pretty: true });
    assert.equal(result.code, 2);
    const lines = result.stderr.split("\n");
    assert.equal(lines[0], "error[E_CONTINUE_OUTSIDE_LOOP]: 'continue' outside of a loop");
    assert.ok(lines[1].endsWith("main.pile:2:1"));
    assert.equal(lines[2], "  hint: 'continue' must appear inside a 'loop ... end' block of the same procedure.");
  });

  it("returns 4 when the file cannot be read", async () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "pile-cli-check-test-"));
    const err: string[] = [];
    const origError = console.error;
    console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));
    try {
      const code = await runCheck(path.join(tmpDir, "missing.pile"), { cwd: tmpDir, homeDir: tmpDir });
      assert.equal(code, 4);
      assert.equal(JSON.parse(err[0]).code, "E_IO");
    } finally {
      console.error = origError;
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });
});
