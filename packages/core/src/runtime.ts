/**
 * Pile runtime primitives shared by the evaluator and builtins.
 */
import type { Span } from "./ast.js";
import type { DiagDetails } from "./diagnostics.js";
import type { PileValue } from "./values.js";

// --- Runtime error ---
export class PileRuntimeError extends Error {
  code: string;
  span?: Span;
  details?: DiagDetails;

  constructor(code: string, message: string, span?: Span, details?: DiagDetails) {
    super(message);
    this.name = "PileRuntimeError";
    this.code = code;
    this.span = span;
    this.details = details;
  }
}

/**
 * Raised by the `exit` builtin; execute() turns it into a status.
 */
export class ExitSignal extends PileRuntimeError {
  status: number;

  constructor(status: number, span?: Span) {
    super("E_USER_EXIT", `program exited with status ${status}`, span, { status });
    this.name = "ExitSignal";
    this.status = status;
  }
}

// --- I/O collaborators ---
export interface IoPorts {
  write(text: string): void;
  writeError(text: string): void;
  /** Next input line without its terminator, or null at end of input. */
  readLine(): string | null;
  readFile?(filePath: string): string | undefined;
  writeFile?(filePath: string, text: string): boolean;
}

/**
 * In-memory ports, used by tests and embedders that capture output.
 */
export class BufferedIo implements IoPorts {
  out = "";
  err = "";
  files = new Map<string, string>();
  private lines: string[];

  constructor(input: string = "", files: Record<string, string> = {}) {
    this.lines = input === "" ? [] : input.replace(/\r?\n$/, "").split(/\r?\n/);
    for (const [name, text] of Object.entries(files)) {
      this.files.set(name, text);
    }
  }

  write(text: string): void {
    this.out += text;
  }

  writeError(text: string): void {
    this.err += text;
  }

  readLine(): string | null {
    return this.lines.shift() ?? null;
  }

  readFile(filePath: string): string | undefined {
    return this.files.get(filePath);
  }

  writeFile(filePath: string, text: string): boolean {
    this.files.set(filePath, text);
    return true;
  }
}

// --- Evaluation stack ---
export class Stack {
  private items: PileValue[];
  // Lowest index an `array` body may pop down to
  private floors: number[] = [];

  constructor(initial: PileValue[] = []) {
    this.items = [...initial];
  }

  get size(): number {
    return this.items.length;
  }

  push(...values: PileValue[]): void {
    this.items.push(...values);
  }

  /**
   * Pop `n` values, returned deepest first (the last element was the top).
   */
  popN(n: number, op: string, span?: Span): PileValue[] {
    this.require(n, op, span);
    return this.items.splice(this.items.length - n, n);
  }

  pop(op: string, span?: Span): PileValue {
    this.require(1, op, span);
    return this.items.pop() ?? null;
  }

  peek(op: string, span?: Span): PileValue {
    this.require(1, op, span);
    return this.items[this.items.length - 1] ?? null;
  }

  openFloor(): number {
    const mark = this.items.length;
    this.floors.push(mark);
    return mark;
  }

  /**
   * Close the innermost floor and remove everything pushed above it.
   */
  closeFloor(): PileValue[] {
    const mark = this.floors.pop() ?? 0;
    return this.items.splice(mark);
  }

  dropFloor(): void {
    this.floors.pop();
  }

  toArray(): PileValue[] {
    return [...this.items];
  }

  private require(n: number, op: string, span?: Span): void {
    const floor = this.floors[this.floors.length - 1] ?? 0;
    const available = this.items.length - floor;
    if (available < n) {
      const noun = n === 1 ? "value" : "values";
      throw new PileRuntimeError(
        "E_STACK_UNDERFLOW",
        `'${op}' needs ${n} ${noun} but the stack has ${available}`,
        span,
        { op, needed: n, available }
      );
    }
  }
}
