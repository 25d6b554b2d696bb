/**
 * pile trace - trace summary command
 */
import * as fs from "node:fs";
import { z } from "zod";

const traceLineSchema = z.object({
  ts: z.string(),
  runId: z.string(),
  event: z.string(),
  span: z.unknown().optional(),
  data: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
});

type TraceLine = z.infer<typeof traceLineSchema>;

export interface TraceSummary {
  runId: string;
  totalEvents: number;
  skippedLines: number;
  unitsRun: number;
  procCalls: number;
  procsByName: Record<string, number>;
  defEvaluations: number;
  failures: number;
  error?: string;
  exitStatus?: number;
  startTime?: string;
  endTime?: string;
  durationMs?: number;
}

function parseTraceLine(line: string): TraceLine | undefined {
  let data: unknown;
  try {
    data = JSON.parse(line);
  } catch {
    return undefined;
  }
  const parsed = traceLineSchema.safeParse(data);
  return parsed.success ? parsed.data : undefined;
}

export function summarizeTrace(content: string): TraceSummary | undefined {
  const lines = content.split("\n").filter((l) => l.trim());
  const events: TraceLine[] = [];
  for (const line of lines) {
    const ev = parseTraceLine(line);
    if (ev) events.push(ev);
  }

  const first = events[0];
  if (!first) return undefined;

  const summary: TraceSummary = {
    runId: first.runId,
    totalEvents: events.length,
    skippedLines: lines.length - events.length,
    unitsRun: 0,
    procCalls: 0,
    procsByName: {},
    defEvaluations: 0,
    failures: 0,
  };

  for (const ev of events) {
    switch (ev.event) {
      case "run_start":
        summary.startTime = ev.ts;
        break;
      case "unit_start":
        summary.unitsRun++;
        break;
      case "proc_call_start": {
        summary.procCalls++;
        const name = String(ev.data?.["proc"] ?? "unknown");
        summary.procsByName[name] = (summary.procsByName[name] ?? 0) + 1;
        break;
      }
      case "def_eval":
        summary.defEvaluations++;
        break;
      case "run_end": {
        summary.endTime = ev.ts;
        const error = ev.data?.["error"];
        const status = ev.data?.["status"];
        if (typeof error === "string") {
          summary.failures++;
          summary.error = error;
        }
        if (typeof status === "number") {
          summary.exitStatus = status;
        }
        break;
      }
    }
  }

  if (summary.startTime && summary.endTime) {
    summary.durationMs = new Date(summary.endTime).getTime() - new Date(summary.startTime).getTime();
  }
  return summary;
}

export async function runTrace(
  file: string,
  opts: { json?: boolean }
): Promise<number> {
  let content: string;
  try {
    content = fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(`Error reading trace file: ${msg}`);
    return 4;
  }

  const summary = summarizeTrace(content);
  if (!summary) {
    console.error("No valid trace events found.");
    return 4;
  }

  if (opts.json) {
    console.log(JSON.stringify(summary, null, 2));
    return 0;
  }

  console.log(`Trace Summary`);
  console.log(`  Run ID:           ${summary.runId}`);
  console.log(`  Total events:     ${summary.totalEvents}`);
  if (summary.skippedLines > 0) {
    console.log(`  Skipped lines:    ${summary.skippedLines}`);
  }
  console.log(`  Units run:        ${summary.unitsRun}`);
  console.log(`  Proc calls:       ${summary.procCalls}`);
  if (Object.keys(summary.procsByName).length > 0) {
    console.log(`  Procs called:`);
    for (const [name, count] of Object.entries(summary.procsByName)) {
      console.log(`    ${name}: ${count}`);
    }
  }
  console.log(`  Def evaluations:  ${summary.defEvaluations}`);
  console.log(`  Failures:         ${summary.failures}`);
  if (summary.error) {
    console.log(`  Error:            ${summary.error}`);
  }
  if (summary.exitStatus !== undefined) {
    console.log(`  Exit status:      ${summary.exitStatus}`);
  }
  if (summary.durationMs !== undefined) {
    console.log(`  Duration:         ${summary.durationMs}ms`);
  }
  return 0;
}
