/**
 * Pile AST node definitions.
 */

export interface Span {
  file: string;
  startLine: number;
  startCol: number;
  endLine: number;
  endCol: number;
}

// Base node with span
export interface BaseNode {
  kind: string;
  span: Span;
}

// --- Literals ---
export interface NumberLiteral extends BaseNode {
  kind: "NumberLiteral";
  value: number;
}

export interface StringLiteral extends BaseNode {
  kind: "StringLiteral";
  value: string;
}

export interface BoolLiteral extends BaseNode {
  kind: "BoolLiteral";
  value: boolean;
}

export interface NilLiteral extends BaseNode {
  kind: "NilLiteral";
}

export type Literal = NumberLiteral | StringLiteral | BoolLiteral | NilLiteral;

// --- Words and operators ---
export interface Word extends BaseNode {
  kind: "Word";
  name: string;
}

export const OPERATOR_SYMBOLS = [
  "**", ">>", "<<", ">=", "<=", "!=",
  "+", "-", "*", "/", "%", "=", ">", "<", "|", "&", "~", "@", "!", "?",
] as const;

export type OperatorSymbol = (typeof OPERATOR_SYMBOLS)[number];

export interface Operator extends BaseNode {
  kind: "Operator";
  op: OperatorSymbol;
}

// --- Control flow ---
export interface IfBlock extends BaseNode {
  kind: "IfBlock";
  thenBody: Instruction[];
  elseBody?: Instruction[];
}

export interface LoopBlock extends BaseNode {
  kind: "LoopBlock";
  body: Instruction[];
}

export interface Break extends BaseNode {
  kind: "Break";
}

export interface Continue extends BaseNode {
  kind: "Continue";
}

export interface Return extends BaseNode {
  kind: "Return";
}

// --- Declarations ---
export interface ProcDecl extends BaseNode {
  kind: "ProcDecl";
  name: string;
  nameSpan: Span;
  body: Instruction[];
}

export interface DefDecl extends BaseNode {
  kind: "DefDecl";
  name: string;
  nameSpan: Span;
  body: Instruction[];
}

export interface LetDecl extends BaseNode {
  kind: "LetDecl";
  name: string;
}

export interface AsLetBlock extends BaseNode {
  kind: "AsLetBlock";
  names: string[];
  body: Instruction[];
}

export interface ArrayBlock extends BaseNode {
  kind: "ArrayBlock";
  body: Instruction[];
}

export interface ImportDecl extends BaseNode {
  kind: "ImportDecl";
  path: string;
}

export type Instruction =
  | Literal
  | Word
  | Operator
  | IfBlock
  | LoopBlock
  | Break
  | Continue
  | Return
  | ProcDecl
  | DefDecl
  | LetDecl
  | AsLetBlock
  | ArrayBlock
  | ImportDecl;

// Instructions that own a nested body
export type BlockInstruction = IfBlock | LoopBlock | ProcDecl | DefDecl | AsLetBlock | ArrayBlock;

// --- Program ---
export interface Program extends BaseNode {
  kind: "Program";
  instructions: Instruction[];
}

/**
 * Every nested body of an instruction, in source order.
 */
export function childBodies(instr: Instruction): Instruction[][] {
  switch (instr.kind) {
    case "IfBlock":
      return instr.elseBody ? [instr.thenBody, instr.elseBody] : [instr.thenBody];
    case "LoopBlock":
    case "ProcDecl":
    case "DefDecl":
    case "AsLetBlock":
    case "ArrayBlock":
      return [instr.body];
    default:
      return [];
  }
}
