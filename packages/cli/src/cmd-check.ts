/**
 * pile check - static validation command
 *
 * Parses, validates and binds the program and its imports without running it.
 */
import { loadProgram } from "./load-program.js";

export async function runCheck(
  file: string,
  opts: { pretty?: boolean; import?: string[]; cwd?: string; homeDir?: string }
): Promise<number> {
  const loaded = loadProgram(file, opts);
  if (!loaded.ok) {
    return loaded.exitCode;
  }

  if (opts.pretty) {
    console.log("No errors found.");
  } else {
    console.log("[]");
  }
  return 0;
}
