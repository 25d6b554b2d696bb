/**
 * @pile/std - Pile Standard Library
 *
 * The library itself is plain Pile source under lib/. This module locates
 * it and lists what each unit provides.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { parse, SOURCE_EXTENSION } from "@pile/core";

export const STD_LIB_DIR = fileURLToPath(new URL("../lib/", import.meta.url));

export interface StdProc {
  name: string;
  /** Comment line directly above the declaration, without the '#'. */
  doc: string;
}

export interface StdUnit {
  /** Import name, e.g. "math". */
  name: string;
  path: string;
  procs: StdProc[];
}

export function listStdUnits(): StdUnit[] {
  const files = fs
    .readdirSync(STD_LIB_DIR)
    .filter((f) => f.endsWith(SOURCE_EXTENSION))
    .sort();

  return files.map((file) => {
    const filePath = path.join(STD_LIB_DIR, file);
    const source = fs.readFileSync(filePath, "utf-8");
    const lines = source.split(/\r?\n/);
    const parsed = parse(source, filePath);
    if (!parsed.program) {
      throw new Error(`standard library unit '${file}' does not parse: ${parsed.diagnostics[0]?.message ?? "unknown error"}`);
    }

    const procs: StdProc[] = [];
    for (const instr of parsed.program.instructions) {
      if (instr.kind !== "ProcDecl") continue;
      const above = lines[instr.span.startLine - 2] ?? "";
      procs.push({ name: instr.name, doc: above.startsWith("#") ? above.replace(/^#\s*/, "") : "" });
    }
    return { name: path.basename(file, SOURCE_EXTENSION), path: filePath, procs };
  });
}
