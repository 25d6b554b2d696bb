/**
 * Black-box trace JSONL parsing and summary computation.
 * Independent of @pile/core: only the documented event format is assumed.
 */
import { z } from "zod";
import type { TraceSummary } from "./types.js";

const KNOWN_EVENTS = [
  "run_start",
  "run_end",
  "unit_start",
  "unit_end",
  "proc_call_start",
  "proc_call_end",
  "def_eval",
] as const;

const rawTraceEventSchema = z.object({
  ts: z.string().optional(),
  runId: z.string().optional(),
  event: z.enum(KNOWN_EVENTS),
  data: z.record(z.unknown()).optional(),
});

export type RawTraceEvent = z.infer<typeof rawTraceEventSchema>;

/**
 * Parse JSONL content into trace events, skipping malformed lines and
 * unknown event kinds.
 */
export function parseTraceJsonl(content: string): RawTraceEvent[] {
  const events: RawTraceEvent[] = [];
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch {
      continue;
    }
    const ev = rawTraceEventSchema.safeParse(parsed);
    if (ev.success) events.push(ev.data);
  }
  return events;
}

/**
 * Compute a TraceSummary from parsed trace events.
 * Volatile fields (runId, ts, durationMs, paths) are left out.
 */
export function computeTraceSummary(events: RawTraceEvent[]): TraceSummary {
  const summary: TraceSummary = {
    totalEvents: events.length,
    unitsRun: 0,
    procCalls: 0,
    procsByName: {},
    defEvaluations: 0,
    failures: 0,
  };

  for (const ev of events) {
    switch (ev.event) {
      case "unit_start":
        summary.unitsRun++;
        break;
      case "proc_call_start": {
        summary.procCalls++;
        const proc = ev.data?.["proc"];
        const name = typeof proc === "string" ? proc : "unknown";
        summary.procsByName[name] = (summary.procsByName[name] ?? 0) + 1;
        break;
      }
      case "def_eval":
        summary.defEvaluations++;
        break;
      case "run_end":
        if (typeof ev.data?.["error"] === "string") summary.failures++;
        break;
    }
  }

  return summary;
}
