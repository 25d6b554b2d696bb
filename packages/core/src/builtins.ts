/**
 * Pile operators and builtin words.
 *
 * Binary operators take the most recently pushed operand as their left-hand
 * side: `2 10 /` is 10 / 2.
 */
import type { OperatorSymbol, Span } from "./ast.js";
import type { IoPorts, Stack } from "./runtime.js";
import { ExitSignal, PileRuntimeError } from "./runtime.js";
import type { PileValue } from "./values.js";
import { codePoints, debugValue, displayValue, isInteger, isTruthy, typeName, valuesEqual } from "./values.js";

export interface BuiltinContext {
  stack: Stack;
  io: IoPorts;
  span: Span;
}

export type BuiltinFn = (ctx: BuiltinContext) => void;

// --- Type checks ---

function typeMismatch(op: string, expected: string, got: PileValue[], span: Span): PileRuntimeError {
  const gotText = got.map(typeName).join(" and ");
  return new PileRuntimeError(
    "E_TYPE_MISMATCH",
    `'${op}' expects ${expected}, got ${gotText}`,
    span,
    { op, expected, got: got.map(typeName) }
  );
}

function expectNumbers(op: string, x: PileValue, y: PileValue, span: Span): [number, number] {
  if (typeof x !== "number" || typeof y !== "number") {
    throw typeMismatch(op, "two numbers", [x, y], span);
  }
  return [x, y];
}

function expectIntegers(op: string, x: PileValue, y: PileValue, span: Span): [bigint, bigint] {
  if (!isInteger(x) || !isInteger(y)) {
    throw typeMismatch(op, "two integers", [x, y], span);
  }
  return [BigInt(x), BigInt(y)];
}

function expectInteger(op: string, v: PileValue, span: Span): number {
  if (!isInteger(v)) throw typeMismatch(op, "an integer", [v], span);
  return v;
}

function expectString(op: string, v: PileValue, span: Span): string {
  if (typeof v !== "string") throw typeMismatch(op, "a string", [v], span);
  return v;
}

function divisionByZero(op: string, span: Span): PileRuntimeError {
  return new PileRuntimeError("E_DIVISION_BY_ZERO", `'${op}' by zero`, span, { op });
}

function toInt64(n: bigint): number {
  return Number(BigInt.asIntN(64, n));
}

/**
 * Shift on 64-bit integers. Counts of 64 or more shift every bit out:
 * `<<` gives 0 and `>>` gives the sign fill.
 */
function shift(op: "<<" | ">>", x: PileValue, y: PileValue, span: Span): number {
  const [value, count] = expectIntegers(op, x, y, span);
  if (count < 0n) {
    throw new PileRuntimeError(
      "E_TYPE_MISMATCH",
      `'${op}' expects a non-negative shift count, got ${count}`,
      span,
      { op, count: Number(count) }
    );
  }
  const word = BigInt.asIntN(64, value);
  if (op === "<<") return count >= 64n ? 0 : toInt64(word << count);
  return toInt64(word >> (count > 63n ? 63n : count));
}

// --- Operators ---

type Binary = (x: PileValue, y: PileValue, span: Span) => PileValue;

/**
 * Lift a binary function over the stack. `x` is the top value.
 */
function binary(op: string, fn: Binary): BuiltinFn {
  return ({ stack, span }) => {
    const [y, x] = stack.popN(2, op, span);
    stack.push(fn(x, y, span));
  };
}

function arithmetic(op: string, fn: (a: number, b: number, span: Span) => number): BuiltinFn {
  return binary(op, (x, y, span) => {
    const [a, b] = expectNumbers(op, x, y, span);
    return fn(a, b, span);
  });
}

function compareStrings(a: string, b: string): number {
  const xs = codePoints(a);
  const ys = codePoints(b);
  for (let i = 0; i < xs.length && i < ys.length; i++) {
    const diff = (xs[i]?.codePointAt(0) ?? 0) - (ys[i]?.codePointAt(0) ?? 0);
    if (diff !== 0) return Math.sign(diff);
  }
  return Math.sign(xs.length - ys.length);
}

function ordering(op: string, cmp: (order: number) => boolean): BuiltinFn {
  return binary(op, (x, y, span) => {
    if (typeof x === "number" && typeof y === "number") {
      return cmp(x < y ? -1 : x > y ? 1 : x === y ? 0 : NaN);
    }
    if (typeof x === "string" && typeof y === "string") {
      return cmp(compareStrings(x, y));
    }
    throw typeMismatch(op, "two numbers or two strings", [x, y], span);
  });
}

function logical(op: string, onInts: (a: bigint, b: bigint) => bigint, onBools: (a: boolean, b: boolean) => boolean): BuiltinFn {
  return binary(op, (x, y, span) => {
    if (typeof x === "boolean" && typeof y === "boolean") return onBools(x, y);
    const [a, b] = expectIntegers(op, x, y, span);
    return toInt64(onInts(a, b));
  });
}

export const OPERATORS: Record<OperatorSymbol, BuiltinFn> = {
  "+": arithmetic("+", (a, b) => a + b),
  "-": arithmetic("-", (a, b) => a - b),
  "*": arithmetic("*", (a, b) => a * b),
  "/": arithmetic("/", (a, b, span) => {
    if (b === 0) throw divisionByZero("/", span);
    return a / b;
  }),
  "%": arithmetic("%", (a, b, span) => {
    if (b === 0) throw divisionByZero("%", span);
    return a % b;
  }),
  "**": arithmetic("**", (a, b) => a ** b),
  "=": binary("=", (x, y) => valuesEqual(x, y)),
  "!=": binary("!=", (x, y) => !valuesEqual(x, y)),
  "<": ordering("<", (o) => o < 0),
  ">": ordering(">", (o) => o > 0),
  "<=": ordering("<=", (o) => o <= 0),
  ">=": ordering(">=", (o) => o >= 0),
  "<<": binary("<<", (x, y, span) => shift("<<", x, y, span)),
  ">>": binary(">>", (x, y, span) => shift(">>", x, y, span)),
  "|": logical("|", (a, b) => a | b, (a, b) => a || b),
  "&": logical("&", (a, b) => a & b, (a, b) => a && b),
  "~": ({ stack, span }) => {
    const v = stack.pop("~", span);
    if (typeof v === "boolean") {
      stack.push(!v);
      return;
    }
    stack.push(toInt64(~BigInt(expectInteger("~", v, span))));
  },
  "?": ({ stack, span }) => {
    stack.push(stack.pop("?", span) === null);
  },
  "@": ({ stack, span }) => {
    const [seq, index] = stack.popN(2, "@", span);
    const i = expectInteger("@", index, span);
    if (Array.isArray(seq)) {
      stack.push(elementAt(seq, i, span));
    } else if (typeof seq === "string") {
      stack.push(elementAt(codePoints(seq), i, span));
    } else {
      throw typeMismatch("@", "an array or a string and an index", [seq, index], span);
    }
  },
  "!": ({ stack, span }) => {
    const [seq, index, value] = stack.popN(3, "!", span);
    if (!Array.isArray(seq)) {
      throw typeMismatch("!", "an array, an index and a value", [seq, index, value], span);
    }
    const i = expectInteger("!", index, span);
    checkIndex(i, seq.length, span);
    seq[i] = value;
  },
};

function checkIndex(i: number, length: number, span: Span): void {
  if (i < 0 || i >= length) {
    throw new PileRuntimeError(
      "E_INDEX_OUT_OF_BOUNDS",
      `index ${i} is out of bounds for length ${length}`,
      span,
      { index: i, length }
    );
  }
}

function elementAt<T>(items: T[], i: number, span: Span): T {
  checkIndex(i, items.length, span);
  const item = items[i];
  if (item === undefined) throw new PileRuntimeError("E_INDEX_OUT_OF_BOUNDS", `index ${i} is out of bounds`, span);
  return item;
}

// --- Builtin words ---

function toNumberOrNil(text: string): number | null {
  const trimmed = text.trim();
  if (trimmed === "") return null;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : null;
}

const BUILTIN_TABLE: Record<string, BuiltinFn> = {
  // Stack shuffling
  dup: ({ stack, span }) => {
    stack.push(stack.peek("dup", span));
  },
  drop: ({ stack, span }) => {
    stack.pop("drop", span);
  },
  swap: ({ stack, span }) => {
    const [a, b] = stack.popN(2, "swap", span);
    stack.push(b, a);
  },
  over: ({ stack, span }) => {
    const [a, b] = stack.popN(2, "over", span);
    stack.push(a, b, a);
  },
  rot: ({ stack, span }) => {
    const [a, b, c] = stack.popN(3, "rot", span);
    stack.push(b, c, a);
  },

  // Output and input
  print: ({ stack, io, span }) => {
    io.write(displayValue(stack.pop("print", span)));
  },
  println: ({ stack, io, span }) => {
    io.write(displayValue(stack.pop("println", span)) + "\n");
  },
  eprint: ({ stack, io, span }) => {
    io.writeError(displayValue(stack.pop("eprint", span)));
  },
  eprintln: ({ stack, io, span }) => {
    io.writeError(displayValue(stack.pop("eprintln", span)) + "\n");
  },
  trace: ({ stack, io, span }) => {
    io.write(debugValue(stack.peek("trace", span)) + "\n");
  },
  input: ({ stack, io }) => {
    stack.push(io.readLine());
  },
  readfile: ({ stack, io, span }) => {
    const filePath = expectString("readfile", stack.pop("readfile", span), span);
    stack.push(io.readFile?.(filePath) ?? null);
  },
  writefile: ({ stack, io, span }) => {
    const [text, target] = stack.popN(2, "writefile", span);
    const filePath = expectString("writefile", target, span);
    stack.push(io.writeFile?.(filePath, displayValue(text)) ?? false);
  },
  exit: ({ stack, span }) => {
    throw new ExitSignal(expectInteger("exit", stack.pop("exit", span), span), span);
  },

  // Conversions and inspection
  typeof: ({ stack, span }) => {
    stack.push(typeName(stack.pop("typeof", span)));
  },
  len: ({ stack, span }) => {
    const v = stack.pop("len", span);
    if (Array.isArray(v)) {
      stack.push(v.length);
    } else if (typeof v === "string") {
      stack.push(codePoints(v).length);
    } else {
      throw typeMismatch("len", "an array or a string", [v], span);
    }
  },
  chr: ({ stack, span }) => {
    const code = expectInteger("chr", stack.pop("chr", span), span);
    stack.push(code >= 0 && code <= 0x10ffff ? String.fromCodePoint(code) : null);
  },
  ord: ({ stack, span }) => {
    const text = expectString("ord", stack.pop("ord", span), span);
    stack.push(text.codePointAt(0) ?? null);
  },
  toint: ({ stack, span }) => {
    const v = stack.pop("toint", span);
    if (typeof v === "number") {
      stack.push(Math.trunc(v));
    } else if (typeof v === "string") {
      const n = toNumberOrNil(v);
      stack.push(n === null ? null : Math.trunc(n));
    } else if (typeof v === "boolean") {
      stack.push(v ? 1 : 0);
    } else {
      stack.push(null);
    }
  },
  tofloat: ({ stack, span }) => {
    const v = stack.pop("tofloat", span);
    if (typeof v === "number") {
      stack.push(v);
    } else if (typeof v === "string") {
      stack.push(toNumberOrNil(v));
    } else if (typeof v === "boolean") {
      stack.push(v ? 1 : 0);
    } else {
      stack.push(null);
    }
  },
  tostring: ({ stack, span }) => {
    stack.push(displayValue(stack.pop("tostring", span)));
  },
  tobool: ({ stack, span }) => {
    stack.push(isTruthy(stack.pop("tobool", span)));
  },
};

export const BUILTINS: ReadonlyMap<string, BuiltinFn> = new Map(Object.entries(BUILTIN_TABLE));

export const BUILTIN_NAMES: ReadonlySet<string> = new Set(BUILTINS.keys());
