/**
 * @pile/cli - CLI entry point re-exports
 */
export { runCheck } from "./cmd-check.js";
export { runRun } from "./cmd-run.js";
export type { RunOptions } from "./cmd-run.js";
export { runFmt } from "./cmd-fmt.js";
export { runTokens, runParse } from "./cmd-dump.js";
export { runTrace, summarizeTrace } from "./cmd-trace.js";
export type { TraceSummary } from "./cmd-trace.js";
export { runConfig } from "./cmd-config.js";
export { runHelp } from "./cmd-help.js";
export { LineReader, createProcessIo, fdChunkSource } from "./stdin.js";
export type { ChunkSource } from "./stdin.js";
