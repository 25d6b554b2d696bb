/**
 * Pile parser using Chevrotain.
 * Produces a Pile AST from tokens.
 */
import {
  CstParser,
  EOF,
  tokenLabel,
  tokenMatcher,
  type CstElement,
  type CstNode,
  type IParserErrorMessageProvider,
  type IToken,
  type TokenType,
} from "chevrotain";
import {
  allTokens,
  lexSource,
  tokenSpan,
  tokenValue,
  If,
  Else,
  End,
  Loop,
  Break,
  Continue,
  Return,
  Proc,
  Def,
  Let,
  As,
  ArrayKw,
  Import,
  True,
  False,
  Nil,
  Ident,
  NumberLit,
  CharLit,
  StringLit,
  OperatorTok,
} from "./lexer.js";
import type * as AST from "./ast.js";
import type { Span } from "./ast.js";
import { OPERATOR_SYMBOLS } from "./ast.js";
import type { Diagnostic } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";

// --- Error messages ---

function describeFound(token: IToken): string {
  return token.tokenType === EOF ? "end of file" : `'${token.image}'`;
}

function describeExpected(paths: TokenType[][]): string {
  const labels = new Set<string>();
  for (const path of paths) {
    const first = path[0];
    if (first) labels.add(tokenLabel(first));
  }
  return labels.size === 0 ? "instruction" : [...labels].join(" or ");
}

const errorMessageProvider: IParserErrorMessageProvider = {
  buildMismatchTokenMessage({ expected, actual }) {
    return `expected ${tokenLabel(expected)} but found ${describeFound(actual)}`;
  },
  buildNotAllInputParsedMessage({ firstRedundant }) {
    return `expected end of file but found ${describeFound(firstRedundant)}`;
  },
  buildNoViableAltMessage({ expectedPathsPerAlt, actual }) {
    const found = actual[0];
    const expected = describeExpected(expectedPathsPerAlt.flat());
    return `expected ${expected} but found ${found ? describeFound(found) : "end of file"}`;
  },
  buildEarlyExitMessage({ actual, customUserDescription }) {
    const found = actual[0];
    const expected = customUserDescription ?? "at least one more token";
    return `expected ${expected} but found ${found ? describeFound(found) : "end of file"}`;
  },
};

class PileCstParser extends CstParser {
  constructor() {
    super(allTokens, {
      recoveryEnabled: false,
      nodeLocationTracking: "full",
      errorMessageProvider,
    });
    this.performSelfAnalysis();
  }

  program = this.RULE("program", () => {
    this.MANY(() => {
      this.SUBRULE(this.instruction);
    });
  });

  block = this.RULE("block", () => {
    this.MANY(() => {
      this.SUBRULE(this.instruction);
    });
  });

  instruction = this.RULE("instruction", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.literal) },
      { ALT: () => this.CONSUME(Ident) },
      { ALT: () => this.CONSUME(OperatorTok) },
      { ALT: () => this.SUBRULE(this.ifBlock) },
      { ALT: () => this.SUBRULE(this.loopBlock) },
      { ALT: () => this.SUBRULE(this.procDecl) },
      { ALT: () => this.SUBRULE(this.defDecl) },
      { ALT: () => this.SUBRULE(this.letDecl) },
      { ALT: () => this.SUBRULE(this.asLetBlock) },
      { ALT: () => this.SUBRULE(this.arrayBlock) },
      { ALT: () => this.SUBRULE(this.importDecl) },
      { ALT: () => this.CONSUME(Break) },
      { ALT: () => this.CONSUME(Continue) },
      { ALT: () => this.CONSUME(Return) },
    ]);
  });

  ifBlock = this.RULE("ifBlock", () => {
    this.CONSUME(If);
    this.SUBRULE(this.block, { LABEL: "thenBody" });
    this.OPTION(() => {
      this.CONSUME(Else);
      this.SUBRULE2(this.block, { LABEL: "elseBody" });
    });
    this.CONSUME(End);
  });

  loopBlock = this.RULE("loopBlock", () => {
    this.CONSUME(Loop);
    this.SUBRULE(this.block);
    this.CONSUME(End);
  });

  procDecl = this.RULE("procDecl", () => {
    this.CONSUME(Proc);
    this.CONSUME(Ident);
    this.SUBRULE(this.block);
    this.CONSUME(End);
  });

  defDecl = this.RULE("defDecl", () => {
    this.CONSUME(Def);
    this.CONSUME(Ident);
    this.SUBRULE(this.block);
    this.CONSUME(End);
  });

  letDecl = this.RULE("letDecl", () => {
    this.CONSUME(Let);
    this.CONSUME(Ident);
  });

  asLetBlock = this.RULE("asLetBlock", () => {
    this.CONSUME(As);
    this.AT_LEAST_ONE({
      DEF: () => this.CONSUME(Ident),
      ERR_MSG: "at least one identifier",
    });
    this.CONSUME(Let);
    this.SUBRULE(this.block);
    this.CONSUME(End);
  });

  arrayBlock = this.RULE("arrayBlock", () => {
    this.CONSUME(ArrayKw);
    this.SUBRULE(this.block);
    this.CONSUME(End);
  });

  importDecl = this.RULE("importDecl", () => {
    this.CONSUME(Import);
    this.CONSUME(StringLit);
  });

  literal = this.RULE("literal", () => {
    this.OR([
      { ALT: () => this.CONSUME(NumberLit) },
      { ALT: () => this.CONSUME(CharLit) },
      { ALT: () => this.CONSUME(StringLit) },
      { ALT: () => this.CONSUME(True) },
      { ALT: () => this.CONSUME(False) },
      { ALT: () => this.CONSUME(Nil) },
    ]);
  });
}

// Singleton parser instance
const cstParser = new PileCstParser();

// --- CST to AST visitor ---

function isToken(el: CstElement): el is IToken {
  return "image" in el;
}

function childNodes(cst: CstNode, key: string): CstNode[] {
  return (cst.children[key] ?? []).filter((el): el is CstNode => !isToken(el));
}

function childTokens(cst: CstNode, key: string): IToken[] {
  return (cst.children[key] ?? []).filter(isToken);
}

function firstNode(cst: CstNode, key: string): CstNode {
  const node = childNodes(cst, key)[0];
  if (!node) throw new Error(`Missing '${key}' in ${cst.name}`);
  return node;
}

function firstToken(cst: CstNode, key: string): IToken {
  const token = childTokens(cst, key)[0];
  if (!token) throw new Error(`Missing '${key}' in ${cst.name}`);
  return token;
}

function cstSpan(node: CstNode, file: string): Span {
  const loc = node.location;
  if (loc && !Number.isNaN(loc.startOffset)) {
    return {
      file,
      startLine: loc.startLine ?? 1,
      startCol: loc.startColumn ?? 1,
      endLine: loc.endLine ?? 1,
      endCol: (loc.endColumn ?? 1) + 1,
    };
  }
  return { file, startLine: 1, startCol: 1, endLine: 1, endCol: 1 };
}

function visitBody(cst: CstNode, file: string): AST.Instruction[] {
  return childNodes(cst, "instruction").map((i) => visitInstruction(i, file));
}

function visitInstruction(cst: CstNode, file: string): AST.Instruction {
  const children = cst.children;
  if (children["literal"]) return visitLiteral(firstNode(cst, "literal"), file);
  if (children["Ident"]) {
    const t = firstToken(cst, "Ident");
    return { kind: "Word", span: tokenSpan(t, file), name: t.image };
  }
  if (children["Operator"]) {
    const t = firstToken(cst, "Operator");
    const op = OPERATOR_SYMBOLS.find((o) => o === t.image);
    if (!op) throw new Error(`Unknown operator '${t.image}'`);
    return { kind: "Operator", span: tokenSpan(t, file), op };
  }
  if (children["ifBlock"]) return visitIfBlock(firstNode(cst, "ifBlock"), file);
  if (children["loopBlock"]) {
    const node = firstNode(cst, "loopBlock");
    return { kind: "LoopBlock", span: cstSpan(node, file), body: visitBody(firstNode(node, "block"), file) };
  }
  if (children["procDecl"]) {
    const node = firstNode(cst, "procDecl");
    const name = firstToken(node, "Ident");
    return {
      kind: "ProcDecl",
      span: cstSpan(node, file),
      name: name.image,
      nameSpan: tokenSpan(name, file),
      body: visitBody(firstNode(node, "block"), file),
    };
  }
  if (children["defDecl"]) {
    const node = firstNode(cst, "defDecl");
    const name = firstToken(node, "Ident");
    return {
      kind: "DefDecl",
      span: cstSpan(node, file),
      name: name.image,
      nameSpan: tokenSpan(name, file),
      body: visitBody(firstNode(node, "block"), file),
    };
  }
  if (children["letDecl"]) {
    const node = firstNode(cst, "letDecl");
    return { kind: "LetDecl", span: cstSpan(node, file), name: firstToken(node, "Ident").image };
  }
  if (children["asLetBlock"]) {
    const node = firstNode(cst, "asLetBlock");
    return {
      kind: "AsLetBlock",
      span: cstSpan(node, file),
      names: childTokens(node, "Ident").map((t) => t.image),
      body: visitBody(firstNode(node, "block"), file),
    };
  }
  if (children["arrayBlock"]) {
    const node = firstNode(cst, "arrayBlock");
    return { kind: "ArrayBlock", span: cstSpan(node, file), body: visitBody(firstNode(node, "block"), file) };
  }
  if (children["importDecl"]) {
    const node = firstNode(cst, "importDecl");
    const pathToken = firstToken(node, "StringLit");
    return { kind: "ImportDecl", span: cstSpan(node, file), path: String(tokenValue(pathToken)) };
  }
  if (children["Break"]) return { kind: "Break", span: tokenSpan(firstToken(cst, "Break"), file) };
  if (children["Continue"]) return { kind: "Continue", span: tokenSpan(firstToken(cst, "Continue"), file) };
  if (children["Return"]) return { kind: "Return", span: tokenSpan(firstToken(cst, "Return"), file) };
  throw new Error("Unknown instruction type");
}

function visitIfBlock(cst: CstNode, file: string): AST.IfBlock {
  const result: AST.IfBlock = {
    kind: "IfBlock",
    span: cstSpan(cst, file),
    thenBody: visitBody(firstNode(cst, "thenBody"), file),
  };
  const elseNode = childNodes(cst, "elseBody")[0];
  if (elseNode) {
    result.elseBody = visitBody(elseNode, file);
  }
  return result;
}

function visitLiteral(cst: CstNode, file: string): AST.Literal {
  const children = cst.children;
  if (children["NumberLit"] || children["CharLit"]) {
    const t = childTokens(cst, "NumberLit")[0] ?? firstToken(cst, "CharLit");
    const value = tokenValue(t);
    return { kind: "NumberLiteral", span: tokenSpan(t, file), value: typeof value === "number" ? value : NaN };
  }
  if (children["StringLit"]) {
    const t = firstToken(cst, "StringLit");
    return { kind: "StringLiteral", span: tokenSpan(t, file), value: String(tokenValue(t)) };
  }
  if (children["True"]) {
    return { kind: "BoolLiteral", span: tokenSpan(firstToken(cst, "True"), file), value: true };
  }
  if (children["False"]) {
    return { kind: "BoolLiteral", span: tokenSpan(firstToken(cst, "False"), file), value: false };
  }
  if (children["Nil"]) {
    return { kind: "NilLiteral", span: tokenSpan(firstToken(cst, "Nil"), file) };
  }
  throw new Error("Unknown literal type");
}

// --- Error positions ---

const OPENERS: TokenType[] = [If, Loop, Proc, Def, As, ArrayKw];

/**
 * The innermost block opener that has no matching 'end'.
 */
function findUnclosedOpener(tokens: IToken[]): IToken | undefined {
  const open: IToken[] = [];
  for (const t of tokens) {
    if (OPENERS.some((o) => tokenMatcher(t, o))) {
      open.push(t);
    } else if (tokenMatcher(t, End)) {
      open.pop();
    }
  }
  return open[open.length - 1];
}

const PARSE_MESSAGE = /^expected ([\s\S]*) but found ([\s\S]*)$/;

function parseHint(expected: string, found: string): string {
  if (expected === "'end'") {
    return "Every if, loop, proc, def, as and array block needs a matching 'end'.";
  }
  if (found === "'else'") {
    return "'else' is allowed once, directly inside an 'if' block.";
  }
  if (found === "'end'") {
    return "This 'end' has no matching block opener.";
  }
  if (expected === "identifier" || expected === "at least one identifier") {
    return "Names start with a letter or underscore and cannot be keywords.";
  }
  if (expected === "string literal") {
    return "Imports take a quoted path, e.g. import \"lib.pile\".";
  }
  return "Check syntax near this location.";
}

// --- Public API ---

export interface ParseResult {
  program?: AST.Program;
  diagnostics: Diagnostic[];
}

export function parse(source: string, file: string = "<stdin>"): ParseResult {
  const lexed = lexSource(source, file);
  if (lexed.diagnostics.length > 0) {
    return { diagnostics: lexed.diagnostics };
  }

  cstParser.input = lexed.tokens;
  const cst = cstParser.program();

  const diagnostics: Diagnostic[] = [];
  for (const err of cstParser.errors) {
    const match = PARSE_MESSAGE.exec(err.message);
    const expected = match?.[1] ?? "instruction";
    const found = match?.[2] ?? describeFound(err.token);
    let message = err.message;
    let spanToken: IToken | undefined = err.token;

    if (err.token.tokenType === EOF) {
      const opener = expected === "'end'" ? findUnclosedOpener(lexed.tokens) : undefined;
      if (opener) {
        message = `expected 'end' to close '${opener.image}' but found end of file`;
      }
      spanToken = opener ?? lexed.tokens[lexed.tokens.length - 1];
    }

    diagnostics.push(
      makeDiag(
        "E_PARSE",
        message,
        spanToken ? tokenSpan(spanToken, file) : { file, startLine: 1, startCol: 1, endLine: 1, endCol: 1 },
        parseHint(expected, found),
        { expected, found }
      )
    );
  }

  if (diagnostics.length > 0) {
    return { diagnostics };
  }

  try {
    const program: AST.Program = {
      kind: "Program",
      span: cstSpan(cst, file),
      instructions: visitBody(cst, file),
    };
    return { program, diagnostics: [] };
  } catch (e) {
    diagnostics.push(makeDiag("E_AST", e instanceof Error ? e.message : String(e)));
    return { diagnostics };
  }
}
