/**
 * Tests for pile fmt command behavior.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { createRequire, syncBuiltinESMExports } from "node:module";
import { runFmt } from "./cmd-fmt.js";

const require = createRequire(import.meta.url);

async function captureFmt(
  fn: () => Promise<number>
): Promise<{ code: number; stdout: string; stderr: string }> {
  const out: string[] = [];
  const err: string[] = [];
  const origWrite = process.stdout.write;
  const origError = console.error;
  process.stdout.write = (chunk: string | Uint8Array): boolean => {
    out.push(String(chunk));
    return true;
  };
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const code = await fn();
    return { code, stdout: out.join(""), stderr: err.join("\n") };
  } finally {
    process.stdout.write = origWrite;
    console.error = origError;
  }
}

function withFile<T>(source: string, fn: (file: string) => Promise<T>): Promise<T> {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "pile-cli-fmt-test-"));
  const file = path.join(tmpDir, "main.pile");
  fs.writeFileSync(file, source, "utf-8");
  return fn(file).finally(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });
}

describe("pile fmt", () => {
  it("prints the canonical form to stdout", async () => {
    await withFile("proc sq dup * end   3 sq\nprintln", async (file) => {
      const result = await captureFmt(() => runFmt(file, {}));
      assert.equal(result.code, 0);
      assert.equal(result.stdout, "proc sq\n  dup *\nend\n\n3 sq println\n");
      assert.equal(result.stderr, "");
      assert.equal(fs.readFileSync(file, "utf-8"), "proc sq dup * end   3 sq\nprintln");
    });
  });

  it("rewrites the file with --write", async () => {
    await withFile(`x 0 > if "pos" println end`, async (file) => {
      const result = await captureFmt(() => runFmt(file, { write: true }));
      assert.equal(result.code, 0);
      assert.equal(result.stdout, "");
      assert.equal(fs.readFileSync(file, "utf-8"), `x 0 > if\n  "pos" println\nend\n`);
    });
  });

  it("warns that comments will be dropped", async () => {
    await withFile(`1 println # one\n`, async (file) => {
      const result = await captureFmt(() => runFmt(file, {}));
      assert.equal(result.code, 0);
      assert.equal(result.stdout, "1 println\n");
      assert.equal(result.stderr, "warning: formatting will remove comments from the output.");
    });
  });

  it("does not mistake '#' inside literals for a comment", async () => {
    await withFile(`"#tag" println '#' println\n`, async (file) => {
      const result = await captureFmt(() => runFmt(file, {}));
      assert.equal(result.code, 0);
      assert.equal(result.stdout, `"#tag" println 35 println\n`);
      assert.equal(result.stderr, "");
    });
  });

  it("does not validate or bind", async () => {
    await withFile(`break missing_name`, async (file) => {
      const result = await captureFmt(() => runFmt(file, {}));
      assert.equal(result.code, 0);
      assert.equal(result.stdout, "break missing_name\n");
    });
  });

  it("returns 2 on parse errors", async () => {
    await withFile(`proc p 1`, async (file) => {
      const result = await captureFmt(() => runFmt(file, {}));
      assert.equal(result.code, 2);
      assert.equal(result.stdout, "");
      assert.equal(result.stderr.split("\n")[0], "error[E_PARSE]: expected 'end' to close 'proc' but found end of file");
    });
  });

  it("returns exit code 4 with E_IO on file read failure", async () => {
    const missing = path.join(os.tmpdir(), `pile-missing-fmt-${Date.now()}.pile`);
    const result = await captureFmt(() => runFmt(missing, {}));
    assert.equal(result.code, 4);
    assert.ok(result.stderr.startsWith("error[E_IO]: Error reading file: "));
  });

  it("returns exit code 4 with E_IO on file write failure", async () => {
    await withFile("1 2 +\n", async (file) => {
      const fsCjs = require("fs") as typeof import("node:fs");
      const originalWriteFileSync = fsCjs.writeFileSync;
      fsCjs.writeFileSync = (() => {
        throw new Error("simulated fmt write failure");
      }) as typeof fsCjs.writeFileSync;
      syncBuiltinESMExports();

      try {
        const result = await captureFmt(() => runFmt(file, { write: true }));
        assert.equal(result.code, 4);
        assert.ok(result.stderr.startsWith("error[E_IO]: Error writing file: simulated fmt write failure"));
      } finally {
        fsCjs.writeFileSync = originalWriteFileSync;
        syncBuiltinESMExports();
      }
    });
  });
});
