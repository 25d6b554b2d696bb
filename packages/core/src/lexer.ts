/**
 * Pile lexer using Chevrotain.
 */
import { createToken, Lexer, tokenMatcher, type IToken, type TokenType } from "chevrotain";
import type { Span } from "./ast.js";
import type { Diagnostic } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";

// Categories
export const Keyword = createToken({ name: "Keyword", pattern: Lexer.NA });
export const OperatorTok = createToken({ name: "Operator", pattern: Lexer.NA, label: "operator" });

export const Ident = createToken({
  name: "Ident",
  pattern: /[A-Za-z_][A-Za-z0-9_]*/,
  label: "identifier",
});

function keyword(name: string, word: string): TokenType {
  return createToken({
    name,
    pattern: new RegExp(word),
    label: `'${word}'`,
    longer_alt: Ident,
    categories: [Keyword],
  });
}

// Keywords
export const If = keyword("If", "if");
export const Else = keyword("Else", "else");
export const End = keyword("End", "end");
export const Loop = keyword("Loop", "loop");
export const Break = keyword("Break", "break");
export const Continue = keyword("Continue", "continue");
export const Return = keyword("Return", "return");
export const Proc = keyword("Proc", "proc");
export const Def = keyword("Def", "def");
export const Let = keyword("Let", "let");
export const As = keyword("As", "as");
export const ArrayKw = keyword("Array", "array");
export const Import = keyword("Import", "import");
export const True = keyword("True", "true");
export const False = keyword("False", "false");
export const Nil = keyword("Nil", "nil");

// Literals
export const NumberLit = createToken({
  name: "NumberLit",
  label: "number literal",
  pattern: /-?(?:\d+(?:\.\d*)?|\.\d+)(?![\w.])/,
});
export const CharLit = createToken({
  name: "CharLit",
  label: "character literal",
  pattern: /'(?:[^'\\\n]|\\[^\n])'/,
});
export const StringLit = createToken({
  name: "StringLit",
  label: "string literal",
  pattern: /"(?:[^"\\]|\\[\s\S])*"/,
  line_breaks: true,
});

// Malformed literals are lexed into their own group and reported as E_LEX.
const INVALID = "invalid";
export const MalformedNumber = createToken({
  name: "MalformedNumber",
  pattern: /-?[\d.][\w.]*/,
  group: INVALID,
});
export const MalformedChar = createToken({
  name: "MalformedChar",
  pattern: /'[^'\n]*'?/,
  group: INVALID,
});
export const UnterminatedString = createToken({
  name: "UnterminatedString",
  pattern: /"(?:[^"\\]|\\[\s\S])*/,
  line_breaks: true,
  group: INVALID,
});

function operator(name: string, pattern: RegExp): TokenType {
  return createToken({ name, pattern, categories: [OperatorTok] });
}

// Operators (multi-char before single-char)
export const StarStar = operator("StarStar", /\*\*/);
export const ShiftRight = operator("ShiftRight", />>/);
export const ShiftLeft = operator("ShiftLeft", /<</);
export const GtEq = operator("GtEq", />=/);
export const LtEq = operator("LtEq", /<=/);
export const BangEq = operator("BangEq", /!=/);
export const Plus = operator("Plus", /\+/);
export const Minus = operator("Minus", /-/);
export const Star = operator("Star", /\*/);
export const Slash = operator("Slash", /\//);
export const Percent = operator("Percent", /%/);
export const Equals = operator("Equals", /=/);
export const Gt = operator("Gt", />/);
export const Lt = operator("Lt", /</);
export const Pipe = operator("Pipe", /\|/);
export const Amp = operator("Amp", /&/);
export const Tilde = operator("Tilde", /~/);
export const At = operator("At", /@/);
export const Bang = operator("Bang", /!/);
export const Question = operator("Question", /\?/);

// Whitespace and comments
export const WhiteSpace = createToken({
  name: "WhiteSpace",
  pattern: /\s+/,
  line_breaks: true,
  group: Lexer.SKIPPED,
});
// Kept apart from the token stream so the formatter can tell what it drops
const COMMENTS = "comments";
export const Comment = createToken({
  name: "Comment",
  pattern: /#[^\n\r]*/,
  group: COMMENTS,
});

// Token order matters: longer/more specific tokens first
export const allTokens = [
  WhiteSpace,
  Comment,
  // Literals before operators so "-3" is a number, not Minus
  NumberLit,
  MalformedNumber,
  StringLit,
  UnterminatedString,
  CharLit,
  MalformedChar,
  // Keywords before Ident
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
  StarStar,
  ShiftRight,
  ShiftLeft,
  GtEq,
  LtEq,
  BangEq,
  Plus,
  Minus,
  Star,
  Slash,
  Percent,
  Equals,
  Gt,
  Lt,
  Pipe,
  Amp,
  Tilde,
  At,
  Bang,
  Question,
  // Categories
  Keyword,
  OperatorTok,
];

export const PileLexer = new Lexer(allTokens, { ensureOptimizations: false });

// --- Token records ---

export type TokenKind = "number" | "string" | "identifier" | "keyword" | "symbol";

export interface Token {
  readonly kind: TokenKind;
  readonly image: string;
  readonly value: number | string;
  readonly span: Span;
}

export interface TokenizeResult {
  tokens: Token[];
  diagnostics: Diagnostic[];
}

export interface LexResult {
  tokens: IToken[];
  diagnostics: Diagnostic[];
}

const ESCAPES: ReadonlyMap<string, string> = new Map([
  ["n", "\n"],
  ["r", "\r"],
  ["t", "\t"],
  ["0", "\0"],
  ['"', '"'],
  ["'", "'"],
  ["\\", "\\"],
]);

/**
 * Decode the escapes of a quoted literal body. Returns the offending escape
 * text when one is not recognised.
 */
export function decodeEscapes(body: string): { value: string } | { badEscape: string } {
  let out = "";
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch !== "\\") {
      out += ch;
      continue;
    }
    const next = body[i + 1] ?? "";
    const mapped = ESCAPES.get(next);
    if (mapped === undefined) {
      return { badEscape: `\\${next}` };
    }
    out += mapped;
    i++;
  }
  return { value: out };
}

export function tokenSpan(token: IToken, file: string): Span {
  return {
    file,
    startLine: token.startLine ?? 1,
    startCol: token.startColumn ?? 1,
    endLine: token.endLine ?? 1,
    endCol: (token.endColumn ?? 1) + 1,
  };
}

function invalidTokenMessage(token: IToken): string {
  if (tokenMatcher(token, UnterminatedString)) return "unterminated string literal";
  if (tokenMatcher(token, MalformedChar)) return `malformed character literal ${token.image}`;
  return `malformed number literal '${token.image}'`;
}

/**
 * Run the chevrotain lexer and turn every failure into an E_LEX diagnostic.
 * Escape sequences in string and character literals are checked here too.
 */
export function lexSource(source: string, file: string): LexResult {
  const result = PileLexer.tokenize(source);
  const diagnostics: Diagnostic[] = [];

  for (const err of result.errors) {
    const ch = String.fromCodePoint(source.codePointAt(err.offset) ?? 0);
    diagnostics.push(
      makeDiag(
        "E_LEX",
        `unexpected character '${ch}'`,
        {
          file,
          startLine: err.line ?? 1,
          startCol: err.column ?? 1,
          endLine: err.line ?? 1,
          endCol: (err.column ?? 1) + err.length,
        },
        "Remove the character or put it inside a string literal."
      )
    );
  }

  for (const token of result.groups[INVALID] ?? []) {
    diagnostics.push(makeDiag("E_LEX", invalidTokenMessage(token), tokenSpan(token, file)));
  }

  for (const token of result.tokens) {
    if (tokenMatcher(token, StringLit) || tokenMatcher(token, CharLit)) {
      const decoded = decodeEscapes(token.image.slice(1, -1));
      if ("badEscape" in decoded) {
        diagnostics.push(
          makeDiag(
            "E_LEX",
            `invalid escape sequence '${decoded.badEscape}'`,
            tokenSpan(token, file),
            "Supported escapes are \\n \\r \\t \\0 \\\" \\' and \\\\."
          )
        );
      }
    }
  }

  diagnostics.sort(
    (a, b) =>
      (a.span?.startLine ?? 0) - (b.span?.startLine ?? 0) ||
      (a.span?.startCol ?? 0) - (b.span?.startCol ?? 0)
  );
  return { tokens: result.tokens, diagnostics };
}

export function countComments(source: string): number {
  return PileLexer.tokenize(source).groups[COMMENTS]?.length ?? 0;
}

/**
 * Decoded payload of a literal token: a number for numeric and character
 * literals, the unescaped text for strings, the image otherwise.
 */
export function tokenValue(token: IToken): number | string {
  if (tokenMatcher(token, NumberLit)) return Number(token.image);
  if (tokenMatcher(token, StringLit) || tokenMatcher(token, CharLit)) {
    const decoded = decodeEscapes(token.image.slice(1, -1));
    const text = "value" in decoded ? decoded.value : token.image;
    if (tokenMatcher(token, CharLit)) return text.codePointAt(0) ?? 0;
    return text;
  }
  return token.image;
}

function tokenKind(token: IToken): TokenKind {
  if (tokenMatcher(token, NumberLit) || tokenMatcher(token, CharLit)) return "number";
  if (tokenMatcher(token, StringLit)) return "string";
  if (tokenMatcher(token, Keyword)) return "keyword";
  if (tokenMatcher(token, OperatorTok)) return "symbol";
  return "identifier";
}

export function tokenize(source: string, file: string = "<stdin>"): TokenizeResult {
  const lexed = lexSource(source, file);
  if (lexed.diagnostics.length > 0) {
    return { tokens: [], diagnostics: lexed.diagnostics };
  }
  const tokens = lexed.tokens.map(
    (t): Token => ({
      kind: tokenKind(t),
      image: t.image,
      value: tokenValue(t),
      span: tokenSpan(t, file),
    })
  );
  return { tokens, diagnostics: [] };
}
