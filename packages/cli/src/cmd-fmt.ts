/**
 * pile fmt - print or rewrite a file in canonical layout
 *
 * Only parses: names and block placement are not checked, so unfinished
 * programs can be formatted too. Diagnostics are always human-readable.
 */
import * as fs from "node:fs";
import { countComments, format, formatDiagnostics, parse } from "@pile/core";
import { emitCliError } from "./load-program.js";

const COMMENT_WARNING = "warning: formatting will remove comments from the output.";

export async function runFmt(file: string, opts: { write?: boolean }): Promise<number> {
  let source: string;
  try {
    source = fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    emitCliError("E_IO", `Error reading file: ${msg}`, true);
    return 4;
  }

  const { program, diagnostics } = parse(source, file);
  if (!program) {
    console.error(formatDiagnostics(diagnostics, true));
    return 2;
  }

  if (countComments(source) > 0) {
    console.error(COMMENT_WARNING);
  }

  const formatted = format(program);
  if (!opts.write) {
    process.stdout.write(formatted);
    return 0;
  }

  try {
    fs.writeFileSync(file, formatted, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    emitCliError("E_IO", `Error writing file: ${msg}`, true);
    return 4;
  }
  return 0;
}
