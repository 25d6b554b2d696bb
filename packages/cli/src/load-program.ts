/**
 * Shared front half of `pile run` and `pile check`: read, parse, validate
 * and bind a program, printing diagnostics on failure.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import {
  diagnosticStage,
  formatDiagnostic,
  formatDiagnostics,
  loadSource,
  resolveConfig,
} from "@pile/core";
import type { Bundle, PileConfig } from "@pile/core";
import { STD_LIB_DIR } from "@pile/std";

export const STDIN_FILE = "-";

export interface LoadProgramOptions {
  pretty?: boolean;
  import?: string[];
  cwd?: string;
  homeDir?: string;
}

export type LoadOutcome =
  | { ok: true; bundle: Bundle; config: PileConfig }
  | { ok: false; exitCode: number };

export function emitCliError(code: string, message: string, pretty: boolean): void {
  console.error(formatDiagnostic({ code, message }, pretty));
}

/**
 * Import search order: -I directories, configured importPaths, then the
 * standard library.
 */
export function resolveSearchPaths(cliImports: string[] | undefined, config: PileConfig, cwd: string): string[] {
  return [...(cliImports ?? []).map((dir) => path.resolve(cwd, dir)), ...config.importPaths, STD_LIB_DIR];
}

export function readProgramSource(file: string): string {
  return file === STDIN_FILE ? fs.readFileSync(0, "utf-8") : fs.readFileSync(file, "utf-8");
}

export function loadProgram(file: string, opts: LoadProgramOptions): LoadOutcome {
  const pretty = !!opts.pretty;
  const cwd = opts.cwd ?? process.cwd();

  let source: string;
  try {
    source = readProgramSource(file);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    emitCliError("E_IO", `Error reading file: ${msg}`, pretty);
    return { ok: false, exitCode: 4 };
  }

  const { config } = resolveConfig(cwd, opts.homeDir);
  const displayName = file === STDIN_FILE ? "<stdin>" : file;
  const loaded = loadSource(source, displayName, {
    searchPaths: resolveSearchPaths(opts.import, config, cwd),
  });

  if (!loaded.bundle) {
    console.error(formatDiagnostics(loaded.diagnostics, pretty));
    return { ok: false, exitCode: diagnosticStage(loaded.diagnostics) === "bind" ? 3 : 2 };
  }
  return { ok: true, bundle: loaded.bundle, config };
}
