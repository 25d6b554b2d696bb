#!/usr/bin/env -S node --import tsx
/**
 * pile - Pile Language CLI
 */
import { createRequire } from "node:module";
import { Command } from "commander";
import { runCheck } from "./cmd-check.js";
import { runRun } from "./cmd-run.js";
import { runFmt } from "./cmd-fmt.js";
import { runTokens, runParse } from "./cmd-dump.js";
import { runTrace } from "./cmd-trace.js";
import { runConfig } from "./cmd-config.js";
import { runHelp, QUICKREF } from "./cmd-help.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const program = new Command();

program
  .name("pile")
  .description("Pile: a stack-based concatenative language interpreter")
  .version(pkg.version)
  .addHelpText("after", "\n" + QUICKREF);

program
  .command("run")
  .description("Run a Pile program")
  .argument("<file>", "Pile source file to run (or - for stdin)")
  .option("--trace <path>", "Write JSONL trace to file")
  .option("--pretty", "Human-readable error output", false)
  .option("-I, --import <dir>", "Extra import search directory (repeatable)", collect, [])
  .option("--max-depth <n>", "Procedure call depth limit")
  .action(async (file: string, opts: { trace?: string; pretty?: boolean; import?: string[]; maxDepth?: string }) => {
    const code = await runRun(file, opts);
    process.exit(code);
  });

program
  .command("check")
  .description("Static validation without execution")
  .argument("<file>", "Pile source file to check (or - for stdin)")
  .option("--pretty", "Human-readable output", false)
  .option("-I, --import <dir>", "Extra import search directory (repeatable)", collect, [])
  .action(async (file: string, opts: { pretty?: boolean; import?: string[] }) => {
    const code = await runCheck(file, opts);
    process.exit(code);
  });

program
  .command("tokens")
  .description("Print the token stream as JSON")
  .argument("<file>", "Pile source file (or - for stdin)")
  .option("--pretty", "Human-readable error output", false)
  .action(async (file: string, opts: { pretty?: boolean }) => {
    const code = await runTokens(file, opts);
    process.exit(code);
  });

program
  .command("parse")
  .description("Print the syntax tree as JSON")
  .argument("<file>", "Pile source file (or - for stdin)")
  .option("--pretty", "Human-readable error output", false)
  .option("--out <path>", "Write the JSON to a file instead of stdout")
  .action(async (file: string, opts: { pretty?: boolean; out?: string }) => {
    const code = await runParse(file, opts);
    process.exit(code);
  });

program
  .command("fmt")
  .description("Canonical formatter")
  .argument("<file>", "Pile source file to format")
  .option("--write", "Overwrite file in place", false)
  .action(async (file: string, opts: { write?: boolean }) => {
    const code = await runFmt(file, opts);
    process.exit(code);
  });

program
  .command("trace")
  .description("Display trace summary")
  .argument("<file>", "JSONL trace file")
  .option("--json", "Output as JSON", false)
  .action(async (file: string, opts: { json?: boolean }) => {
    const code = await runTrace(file, opts);
    process.exit(code);
  });

program
  .command("config")
  .description("Display effective configuration and where it came from")
  .option("--json", "Output as JSON", false)
  .action(async (opts: { json?: boolean }) => {
    const code = await runConfig(opts);
    process.exit(code);
  });

program
  .command("help")
  .description("Language reference - run 'pile help <topic>' for details")
  .argument("[topic]", "Topic: syntax, stack, flow, names, builtins, imports, errors, stdlib")
  .option("--index", "For stdlib topic, print every standard library procedure", false)
  .action((topic: string | undefined, opts: { index?: boolean }) => {
    runHelp(topic, opts);
  });

// Reject unknown commands before Commander parses (prevents --help from masking exit code)
const knownCommands = new Set(["run", "check", "tokens", "parse", "fmt", "trace", "config", "help"]);
const userArgs = process.argv.slice(2);
const firstPositional = userArgs.find((a) => !a.startsWith("-"));
if (firstPositional && !knownCommands.has(firstPositional)) {
  console.error(`Unknown command: ${firstPositional}`);
  process.exit(1);
}

await program.parseAsync();
