/**
 * Trace tests: the evaluator emits the expected event sequence.
 *
 * Timestamps and durations vary between runs and are checked for shape only.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { loadSource } from "./binder.js";
import type { SourceHost } from "./binder.js";
import { execute } from "./evaluator.js";
import type { TraceEvent } from "./evaluator.js";
import { BufferedIo, PileRuntimeError } from "./runtime.js";

function traceRun(source: string, modules: Record<string, string> = {}): { events: TraceEvent[]; error?: unknown } {
  const files = new Map(Object.entries(modules));
  const host: SourceHost = { readFile: (p) => files.get(p) };
  const loaded = loadSource(source, "/trace/main.pile", { host });
  assert.ok(loaded.bundle, JSON.stringify(loaded.diagnostics));
  const events: TraceEvent[] = [];
  try {
    execute(loaded.bundle, { io: new BufferedIo(), runId: "test-run", trace: (ev) => events.push(ev) });
  } catch (error) {
    return { events, error };
  }
  return { events };
}

function sanitizeEvents(events: TraceEvent[]): unknown[] {
  return events.map((ev) => {
    const sanitized: Record<string, unknown> = { event: ev.event };
    if (ev.data) {
      const data = { ...ev.data };
      delete data["durationMs"];
      if (Object.keys(data).length > 0) sanitized["data"] = data;
    }
    return sanitized;
  });
}

describe("Pile trace events", () => {
  it("brackets calls and evaluates a definition once", () => {
    const { events } = traceRun(`def k 1 end proc f k drop end f f`);
    assert.deepEqual(sanitizeEvents(events), [
      { event: "run_start", data: { file: "/trace/main.pile" } },
      { event: "unit_start", data: { unit: "/trace/main.pile" } },
      { event: "def_eval", data: { def: "k" } },
      { event: "proc_call_start", data: { proc: "f" } },
      { event: "proc_call_end", data: { proc: "f" } },
      { event: "proc_call_start", data: { proc: "f" } },
      { event: "proc_call_end", data: { proc: "f" } },
      { event: "unit_end", data: { unit: "/trace/main.pile" } },
      { event: "run_end", data: { status: 0 } },
    ]);
  });

  it("stamps every event with the run id and a timestamp", () => {
    const { events } = traceRun(`1 drop`);
    for (const ev of events) {
      assert.equal(ev.runId, "test-run");
      assert.ok(!Number.isNaN(Date.parse(ev.ts)), ev.ts);
    }
    const end = events[events.length - 1];
    assert.equal(typeof end.data?.["durationMs"], "number");
  });

  it("reports imported units", () => {
    const { events } = traceRun(`import "lib.pile"`, { "/trace/lib.pile": `1 drop` });
    assert.deepEqual(
      sanitizeEvents(events).slice(1, 5),
      [
        { event: "unit_start", data: { unit: "/trace/main.pile" } },
        { event: "unit_start", data: { unit: "/trace/lib.pile" } },
        { event: "unit_end", data: { unit: "/trace/lib.pile" } },
        { event: "unit_end", data: { unit: "/trace/main.pile" } },
      ]
    );
  });

  it("ends with the error code when the run fails", () => {
    const { events, error } = traceRun(`proc f 0 1 / end f`);
    assert.ok(error instanceof PileRuntimeError);
    const last = sanitizeEvents(events).slice(-1);
    assert.deepEqual(last, [
      { event: "run_end", data: { error: "E_DIVISION_BY_ZERO", message: "'/' by zero" } },
    ]);
    assert.deepEqual(
      events.map((e) => e.event),
      ["run_start", "unit_start", "proc_call_start", "run_end"]
    );
  });

  it("records the exit status", () => {
    const { events } = traceRun(`4 exit`);
    assert.deepEqual(sanitizeEvents(events).slice(-1), [{ event: "run_end", data: { status: 4 } }]);
  });
});
