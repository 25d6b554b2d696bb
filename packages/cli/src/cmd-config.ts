/**
 * pile config - effective configuration summary command
 */
import { resolveConfig } from "@pile/core";
import { STD_LIB_DIR } from "@pile/std";

export async function runConfig(
  opts: { json?: boolean; cwd?: string; homeDir?: string }
): Promise<number> {
  const resolved = resolveConfig(opts.cwd, opts.homeDir);
  const { importPaths, maxCallDepth } = resolved.config;

  if (opts.json) {
    console.log(
      JSON.stringify(
        {
          source: resolved.source,
          path: resolved.path,
          config: { importPaths, maxCallDepth },
          stdLibDir: STD_LIB_DIR,
        },
        null,
        2
      )
    );
    return 0;
  }

  console.log("Effective Pile configuration");
  console.log(`  Source:          ${resolved.source}`);
  console.log(`  Path:            ${resolved.path ?? "(none)"}`);
  console.log(`  Import paths:    ${importPaths.length > 0 ? importPaths.join(", ") : "(none)"}`);
  console.log(`  Max call depth:  ${maxCallDepth}`);
  console.log(`  Standard lib:    ${STD_LIB_DIR}`);
  return 0;
}
