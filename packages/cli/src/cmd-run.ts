/**
 * pile run - execute Pile programs
 */
import * as fs from "node:fs";
import * as crypto from "node:crypto";
import { z } from "zod";
import { execute, formatDiagnostic, PileRuntimeError } from "@pile/core";
import type { IoPorts, TraceEvent } from "@pile/core";
import { emitCliError, loadProgram } from "./load-program.js";
import { createProcessIo } from "./stdin.js";

class CliIoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliIoError";
  }
}

export interface RunOptions {
  trace?: string;
  pretty?: boolean;
  import?: string[];
  maxDepth?: string;
  cwd?: string;
  homeDir?: string;
}

const maxDepthSchema = z.coerce.number().int().positive();

// One JSON event per line
function traceWriter(fd: number): (event: TraceEvent) => void {
  return (event) => {
    try {
      fs.writeSync(fd, JSON.stringify(event) + "\n");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new CliIoError(`Error writing trace file: ${msg}`);
    }
  };
}

export async function runRun(file: string, opts: RunOptions, io: IoPorts = createProcessIo()): Promise<number> {
  const pretty = !!opts.pretty;

  let maxDepthOverride: number | undefined;
  if (opts.maxDepth !== undefined) {
    const parsed = maxDepthSchema.safeParse(opts.maxDepth);
    if (!parsed.success) {
      emitCliError("E_USAGE", `--max-depth must be a positive integer, got '${opts.maxDepth}'`, pretty);
      return 1;
    }
    maxDepthOverride = parsed.data;
  }

  const loaded = loadProgram(file, opts);
  if (!loaded.ok) {
    return loaded.exitCode;
  }

  const runId = crypto.randomUUID();

  // Trace setup
  let traceFd: number | null = null;

  if (opts.trace) {
    try {
      traceFd = fs.openSync(opts.trace, "w");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      emitCliError("E_IO", `Error opening trace file: ${msg}`, pretty);
      return 4;
    }
  }

  const traceHandler = traceFd !== null ? traceWriter(traceFd) : undefined;

  // Execute
  let exitCode: number;
  try {
    const result = execute(loaded.bundle, {
      io,
      runId,
      trace: traceHandler,
      maxCallDepth: maxDepthOverride ?? loaded.config.maxCallDepth,
    });
    exitCode = result.status;
  } catch (e) {
    exitCode = reportRunFailure(e, pretty);
  }

  if (traceFd !== null) {
    try {
      fs.closeSync(traceFd);
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      emitCliError("E_IO", `Error closing trace file: ${msg}`, pretty);
      exitCode = 4;
    }
  }
  return exitCode;
}

function reportRunFailure(e: unknown, pretty: boolean): number {
  if (e instanceof CliIoError) {
    emitCliError("E_IO", e.message, pretty);
    return 4;
  }

  if (e instanceof PileRuntimeError) {
    if (pretty) {
      console.error(formatDiagnostic({ code: e.code, message: e.message, span: e.span }, true));
    } else {
      console.error(
        JSON.stringify({
          code: e.code,
          message: e.message,
          span: e.span,
          details: e.details,
        })
      );
    }
    return 4;
  }

  const msg = e instanceof Error ? e.message : String(e);
  emitCliError("E_RUNTIME", msg, pretty);
  return 4;
}
