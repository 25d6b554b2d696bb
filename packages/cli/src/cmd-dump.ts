/**
 * pile tokens / pile parse - front-end dumps as JSON
 */
import * as fs from "node:fs";
import { formatDiagnostics, parse, tokenize } from "@pile/core";
import { emitCliError, readProgramSource, STDIN_FILE } from "./load-program.js";

function readOrReport(file: string, pretty: boolean): string | undefined {
  try {
    return readProgramSource(file);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    emitCliError("E_IO", `Error reading file: ${msg}`, pretty);
    return undefined;
  }
}

function displayName(file: string): string {
  return file === STDIN_FILE ? "<stdin>" : file;
}

export async function runTokens(file: string, opts: { pretty?: boolean }): Promise<number> {
  const pretty = !!opts.pretty;
  const source = readOrReport(file, pretty);
  if (source === undefined) return 4;

  const result = tokenize(source, displayName(file));
  if (result.diagnostics.length > 0) {
    console.error(formatDiagnostics(result.diagnostics, pretty));
    return 2;
  }
  console.log(JSON.stringify(result.tokens, null, 2));
  return 0;
}

/**
 * Parse only: no validation, no import resolution.
 */
export async function runParse(file: string, opts: { pretty?: boolean; out?: string }): Promise<number> {
  const pretty = !!opts.pretty;
  const source = readOrReport(file, pretty);
  if (source === undefined) return 4;

  const result = parse(source, displayName(file));
  if (!result.program) {
    console.error(formatDiagnostics(result.diagnostics, pretty));
    return 2;
  }

  const json = JSON.stringify(result.program, null, 2);
  if (opts.out) {
    try {
      fs.writeFileSync(opts.out, json + "\n", "utf-8");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      emitCliError("E_IO", `Error writing file: ${msg}`, pretty);
      return 4;
    }
    return 0;
  }
  console.log(json);
  return 0;
}
