/**
 * Pile canonical formatter (AST pretty-printer).
 * Produces deterministic, idempotent output.
 */
import type * as AST from "./ast.js";

const INDENT = "  ";
const MAX_INLINE = 80;

export function format(program: AST.Program): string {
  const lines = formatBody(program.instructions, 0);
  return lines.length === 0 ? "" : lines.join("\n") + "\n";
}

function isDeclaration(instr: AST.Instruction): boolean {
  return instr.kind === "ProcDecl" || instr.kind === "DefDecl";
}

/**
 * Straight-line instructions share a line; blocks open a new one. At the top
 * level, declarations are set apart by blank lines.
 */
function formatBody(body: AST.Instruction[], depth: number): string[] {
  const prefix = INDENT.repeat(depth);
  const lines: string[] = [];
  let run: string[] = [];
  let blankPending = false;

  const emit = (line: string): void => {
    if (blankPending && lines.length > 0) lines.push("");
    blankPending = false;
    lines.push(line);
  };
  const flush = (): void => {
    if (run.length > 0) {
      emit(prefix + run.join(" "));
      run = [];
    }
  };

  for (const instr of body) {
    const simple = simpleText(instr);
    if (simple !== undefined) {
      run.push(simple);
      continue;
    }

    if (instr.kind === "ArrayBlock") {
      const inline = inlineArray(instr);
      if (inline !== undefined && (prefix + [...run, inline].join(" ")).length <= MAX_INLINE) {
        run.push(inline);
        continue;
      }
    }

    const topDecl = depth === 0 && isDeclaration(instr);
    if (topDecl) {
      flush();
      blankPending = true;
    }

    if (instr.kind === "IfBlock") {
      // The condition stays on the line that computes it
      run.push("if");
      flush();
    } else if (instr.kind === "ImportDecl") {
      flush();
      emit(`${prefix}import ${quote(instr.path)}`);
      continue;
    } else {
      flush();
      emit(prefix + blockHeader(instr));
    }

    for (const line of formatBlockTail(instr, depth)) {
      emit(line);
    }
    if (topDecl) blankPending = true;
  }
  flush();
  return lines;
}

function blockHeader(instr: AST.Instruction): string {
  switch (instr.kind) {
    case "LoopBlock":
      return "loop";
    case "ProcDecl":
      return `proc ${instr.name}`;
    case "DefDecl":
      return `def ${instr.name}`;
    case "AsLetBlock":
      return `as ${instr.names.join(" ")} let`;
    case "ArrayBlock":
      return "array";
    default:
      return "";
  }
}

/**
 * Body lines, the optional else branch and the closing 'end' of a block.
 */
function formatBlockTail(instr: AST.Instruction, depth: number): string[] {
  const prefix = INDENT.repeat(depth);
  const out: string[] = [];
  if (instr.kind === "IfBlock") {
    out.push(...formatBody(instr.thenBody, depth + 1));
    if (instr.elseBody) {
      out.push(`${prefix}else`, ...formatBody(instr.elseBody, depth + 1));
    }
  } else if (
    instr.kind === "LoopBlock" ||
    instr.kind === "ProcDecl" ||
    instr.kind === "DefDecl" ||
    instr.kind === "AsLetBlock" ||
    instr.kind === "ArrayBlock"
  ) {
    out.push(...formatBody(instr.body, depth + 1));
  }
  out.push(`${prefix}end`);
  return out;
}

function inlineArray(instr: AST.ArrayBlock): string | undefined {
  const parts: string[] = ["array"];
  for (const child of instr.body) {
    const text = child.kind === "ArrayBlock" ? inlineArray(child) : simpleText(child);
    if (text === undefined) return undefined;
    parts.push(text);
  }
  parts.push("end");
  return parts.join(" ");
}

function simpleText(instr: AST.Instruction): string | undefined {
  switch (instr.kind) {
    case "NumberLiteral":
      return formatNumber(instr.value);
    case "StringLiteral":
      return quote(instr.value);
    case "BoolLiteral":
      return String(instr.value);
    case "NilLiteral":
      return "nil";
    case "Word":
      return instr.name;
    case "Operator":
      return instr.op;
    case "LetDecl":
      return `let ${instr.name}`;
    case "Break":
      return "break";
    case "Continue":
      return "continue";
    case "Return":
      return "return";
    default:
      return undefined;
  }
}

const QUOTE_ESCAPES: Record<string, string> = {
  "\\": "\\\\",
  '"': '\\"',
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
  "\0": "\\0",
};

function quote(text: string): string {
  return `"${text.replace(/[\\"\n\r\t\0]/g, (ch) => QUOTE_ESCAPES[ch] ?? ch)}"`;
}

// The lexer has no exponent syntax, so large and tiny numbers are written out.
function formatNumber(value: number): string {
  const raw = String(value);
  return /e/i.test(raw) ? expandScientificNotation(raw) : raw;
}

function expandScientificNotation(value: string): string {
  const [mantissa = "", exponentPart = ""] = value.toLowerCase().split("e");
  const exponent = Number.parseInt(exponentPart, 10);
  if (!Number.isFinite(exponent)) return value;

  let sign = "";
  let digits = mantissa;
  if (digits.startsWith("-")) {
    sign = "-";
    digits = digits.slice(1);
  }

  const dot = digits.indexOf(".");
  const intPart = dot >= 0 ? digits.slice(0, dot) : digits;
  const fracPart = dot >= 0 ? digits.slice(dot + 1) : "";
  const compact = intPart + fracPart;
  const decimalIndex = intPart.length + exponent;

  if (decimalIndex <= 0) {
    return `${sign}0.${"0".repeat(-decimalIndex)}${compact}`;
  }
  if (decimalIndex >= compact.length) {
    return `${sign}${compact}${"0".repeat(decimalIndex - compact.length)}`;
  }
  return `${sign}${compact.slice(0, decimalIndex)}.${compact.slice(decimalIndex)}`;
}
