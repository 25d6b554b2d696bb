/**
 * Pile evaluator - runs a bound program on one shared stack.
 */
import type * as AST from "./ast.js";
import type { Span } from "./ast.js";
import type { Bundle, NameEntry, Unit } from "./binder.js";
import { BUILTINS, OPERATORS } from "./builtins.js";
import { DEFAULT_MAX_CALL_DEPTH } from "./config.js";
import type { IoPorts } from "./runtime.js";
import { ExitSignal, PileRuntimeError, Stack } from "./runtime.js";
import type { PileValue } from "./values.js";
import { typeName } from "./values.js";

// --- Trace events ---
export type TraceEventType =
  | "run_start"
  | "run_end"
  | "unit_start"
  | "unit_end"
  | "proc_call_start"
  | "proc_call_end"
  | "def_eval";

export type TraceData = Record<string, string | number | boolean>;

export interface TraceEvent {
  ts: string;
  runId: string;
  event: TraceEventType;
  span?: Span;
  data?: TraceData;
}

// --- Execution context ---
export interface ExecOptions {
  io: IoPorts;
  runId: string;
  trace?: (event: TraceEvent) => void;
  maxCallDepth?: number;
  stack?: Stack;
}

export interface ExecResult {
  status: number;
  stack: PileValue[];
}

type Flow = "normal" | "break" | "continue" | "return";

// --- Environment ---
export class Env {
  private globals = new Map<string, PileValue>();
  private frames: Map<string, PileValue>[] = [];

  pushFrame(bindings: Map<string, PileValue>): void {
    this.frames.push(bindings);
  }

  popFrame(): void {
    this.frames.pop();
  }

  /**
   * Bind in the innermost frame, or globally when no frame is active.
   */
  assign(name: string, value: PileValue): void {
    const frame = this.frames[this.frames.length - 1];
    (frame ?? this.globals).set(name, value);
  }

  lookup(name: string): PileValue | undefined {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const frame = this.frames[i];
      if (frame?.has(name)) return frame.get(name);
    }
    return this.globals.get(name);
  }
}

// --- Evaluator ---
export function execute(bundle: Bundle, options: ExecOptions): ExecResult {
  const interp = new Interpreter(bundle, options);
  const runStartMs = Date.now();
  interp.emitTrace("run_start", bundle.main.program.span, { file: bundle.main.file });

  try {
    interp.runUnit(bundle.main);
    interp.emitTrace("run_end", bundle.main.program.span, { durationMs: Date.now() - runStartMs, status: 0 });
    return { status: 0, stack: interp.stack.toArray() };
  } catch (e) {
    if (e instanceof ExitSignal) {
      interp.emitTrace("run_end", bundle.main.program.span, {
        durationMs: Date.now() - runStartMs,
        status: e.status,
      });
      return { status: e.status, stack: interp.stack.toArray() };
    }
    const err = toRuntimeError(e, interp.currentSpan);
    interp.emitTrace("run_end", bundle.main.program.span, {
      durationMs: Date.now() - runStartMs,
      error: err instanceof PileRuntimeError ? err.code : "E_RUNTIME",
      message: err instanceof Error ? err.message : String(err),
    });
    throw err;
  }
}

function toRuntimeError(e: unknown, span: Span | undefined): unknown {
  if (e instanceof RangeError && /call stack/i.test(e.message)) {
    return new PileRuntimeError(
      "E_RECURSION_LIMIT",
      "recursion too deep: the host call stack overflowed",
      span
    );
  }
  return e;
}

class Interpreter {
  readonly stack: Stack;
  private env = new Env();
  private io: IoPorts;
  private maxCallDepth: number;
  private callDepth = 0;
  private defCache = new Map<string, PileValue>();
  private defPending = new Set<string>();
  private executedUnits = new Set<string>();
  currentSpan: Span | undefined;

  constructor(
    private bundle: Bundle,
    private options: ExecOptions
  ) {
    this.stack = options.stack ?? new Stack();
    this.io = options.io;
    this.maxCallDepth = options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH;
  }

  emitTrace(event: TraceEventType, span?: Span, data?: TraceData): void {
    if (this.options.trace) {
      this.options.trace({
        ts: new Date().toISOString(),
        runId: this.options.runId,
        event,
        span,
        data,
      });
    }
  }

  /**
   * Run a unit's top level, at most once per execution.
   */
  runUnit(unit: Unit): void {
    if (this.executedUnits.has(unit.id)) return;
    this.executedUnits.add(unit.id);
    this.emitTrace("unit_start", unit.program.span, { unit: unit.file });
    this.executeBlock(unit.program.instructions);
    this.emitTrace("unit_end", unit.program.span, { unit: unit.file });
  }

  private executeBlock(body: AST.Instruction[]): Flow {
    for (const instr of body) {
      const flow = this.executeInstruction(instr);
      if (flow !== "normal") return flow;
    }
    return "normal";
  }

  private executeInstruction(instr: AST.Instruction): Flow {
    this.currentSpan = instr.span;

    switch (instr.kind) {
      case "NumberLiteral":
      case "StringLiteral":
      case "BoolLiteral":
        this.stack.push(instr.value);
        return "normal";

      case "NilLiteral":
        this.stack.push(null);
        return "normal";

      case "Word":
        this.callWord(instr);
        return "normal";

      case "Operator":
        OPERATORS[instr.op]({ stack: this.stack, io: this.io, span: instr.span });
        return "normal";

      case "IfBlock": {
        const cond = this.stack.pop("if", instr.span);
        if (typeof cond !== "boolean") {
          throw new PileRuntimeError(
            "E_TYPE_MISMATCH",
            `'if' expects a bool condition, got ${typeName(cond)}`,
            instr.span,
            { op: "if" }
          );
        }
        if (cond) return this.executeBlock(instr.thenBody);
        return instr.elseBody ? this.executeBlock(instr.elseBody) : "normal";
      }

      case "LoopBlock":
        for (;;) {
          const flow = this.executeBlock(instr.body);
          if (flow === "break") return "normal";
          if (flow === "return") return "return";
        }

      case "Break":
        return "break";

      case "Continue":
        return "continue";

      case "Return":
        return "return";

      case "ProcDecl":
        // Hoisted by the binder
        return "normal";

      case "DefDecl":
        this.defineValue(instr, instr.span);
        return "normal";

      case "LetDecl":
        this.env.assign(instr.name, this.stack.pop("let", instr.span));
        return "normal";

      case "AsLetBlock": {
        const values = this.stack.popN(instr.names.length, "as", instr.span);
        const frame = new Map<string, PileValue>();
        instr.names.forEach((name, i) => frame.set(name, values[i] ?? null));
        this.env.pushFrame(frame);
        try {
          return this.executeBlock(instr.body);
        } finally {
          this.env.popFrame();
        }
      }

      case "ArrayBlock": {
        this.stack.openFloor();
        let flow: Flow;
        try {
          flow = this.executeBlock(instr.body);
        } catch (e) {
          this.stack.dropFloor();
          throw e;
        }
        if (flow !== "normal") {
          this.stack.dropFloor();
          return flow;
        }
        this.stack.push(this.stack.closeFloor());
        return "normal";
      }

      case "ImportDecl": {
        const id = this.bundle.resolvedImports.get(instr);
        const unit = id === undefined ? undefined : this.bundle.units.get(id);
        if (!unit) {
          throw new PileRuntimeError("E_IMPORT_NOT_FOUND", `import '${instr.path}' was not resolved`, instr.span);
        }
        this.runUnit(unit);
        return "normal";
      }
    }
  }

  private callWord(word: AST.Word): void {
    const local = this.env.lookup(word.name);
    if (local !== undefined) {
      this.stack.push(local);
      return;
    }

    const entry = this.bundle.names.get(word.name);
    if (entry) {
      this.callName(entry, word.span);
      return;
    }

    const builtin = BUILTINS.get(word.name);
    if (builtin) {
      builtin({ stack: this.stack, io: this.io, span: word.span });
      return;
    }

    throw new PileRuntimeError(
      "E_UNDEFINED_NAME",
      `undefined name '${word.name}'`,
      word.span,
      { name: word.name }
    );
  }

  private callName(entry: NameEntry, span: Span): void {
    if (entry.kind === "def") {
      this.stack.push(this.defineValue(entry.decl, span));
      return;
    }

    this.enterCall(entry.decl.name, span);
    this.emitTrace("proc_call_start", span, { proc: entry.decl.name });
    try {
      this.executeBlock(entry.decl.body);
    } finally {
      this.callDepth--;
    }
    this.emitTrace("proc_call_end", span, { proc: entry.decl.name });
  }

  /**
   * A definition's body runs once, where the `def` appears in its unit, and
   * must leave exactly one value. A reference reached earlier (from a proc
   * called before that point) evaluates it on demand.
   */
  private defineValue(decl: AST.DefDecl, span: Span): PileValue {
    const cached = this.defCache.get(decl.name);
    if (cached !== undefined) return cached;
    if (this.defPending.has(decl.name)) {
      throw new PileRuntimeError(
        "E_RECURSION_LIMIT",
        `definition '${decl.name}' refers to itself`,
        span,
        { def: decl.name }
      );
    }

    this.enterCall(decl.name, span);
    this.defPending.add(decl.name);
    this.emitTrace("def_eval", span, { def: decl.name });
    const base = this.stack.size;
    try {
      this.executeBlock(decl.body);
    } finally {
      this.defPending.delete(decl.name);
      this.callDepth--;
    }

    const produced = this.stack.size - base;
    if (produced !== 1) {
      throw new PileRuntimeError(
        "E_INVALID_DEFINITION",
        `definition '${decl.name}' must leave exactly one value, it left ${produced}`,
        decl.span,
        { def: decl.name, produced }
      );
    }
    const value = this.stack.pop(decl.name, span);
    this.defCache.set(decl.name, value);
    return value;
  }

  private enterCall(name: string, span: Span): void {
    if (this.callDepth >= this.maxCallDepth) {
      throw new PileRuntimeError(
        "E_RECURSION_LIMIT",
        `call depth limit of ${this.maxCallDepth} exceeded in '${name}'`,
        span,
        { name, limit: this.maxCallDepth }
      );
    }
    this.callDepth++;
  }
}
