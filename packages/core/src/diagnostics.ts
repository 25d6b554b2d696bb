/**
 * Pile diagnostic types for lex/parse/bind/runtime errors.
 */
import type { Span } from "./ast.js";

export type DiagDetails = Record<string, string | number | boolean | string[]>;

export interface Diagnostic {
  code: string;
  message: string;
  span?: Span;
  hint?: string;
  details?: DiagDetails;
}

export function makeDiag(
  code: string,
  message: string,
  span?: Span,
  hint?: string,
  details?: DiagDetails
): Diagnostic {
  const d: Diagnostic = { code, message, span, hint };
  if (details) d.details = details;
  return d;
}

/**
 * "file:line:col" for a diagnostic, or "<unknown>" when it has no span.
 */
export function formatLocation(span: Span | undefined): string {
  return span ? `${span.file}:${span.startLine}:${span.startCol}` : "<unknown>";
}

export function formatDiagnostic(d: Diagnostic, pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(d);
  }
  let out = `error[${d.code}]: ${d.message}\n  --> ${formatLocation(d.span)}`;
  if (d.hint) {
    out += `\n  hint: ${d.hint}`;
  }
  return out;
}

export function formatDiagnostics(diags: Diagnostic[], pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(diags);
  }
  return diags.map((d) => formatDiagnostic(d, true)).join("\n\n");
}

// Error kind groups, used by the CLI to pick exit statuses.
export const LEX_CODES: ReadonlySet<string> = new Set(["E_LEX"]);

export const PARSE_CODES: ReadonlySet<string> = new Set([
  "E_PARSE",
  "E_BREAK_OUTSIDE_LOOP",
  "E_CONTINUE_OUTSIDE_LOOP",
  "E_RETURN_OUTSIDE_PROC",
  "E_NESTED_DECL",
  "E_DUP_BINDING",
  "E_EMPTY_DEF",
]);

export const BIND_CODES: ReadonlySet<string> = new Set([
  "E_DUPLICATE_DEFINITION",
  "E_CYCLIC_IMPORT",
  "E_UNDEFINED_NAME",
  "E_IMPORT_NOT_FOUND",
]);

export type DiagnosticStage = "lex" | "parse" | "bind";

/**
 * The earliest pipeline stage any of the diagnostics belongs to.
 */
export function diagnosticStage(diags: Diagnostic[]): DiagnosticStage {
  if (diags.some((d) => LEX_CODES.has(d.code))) return "lex";
  if (diags.some((d) => PARSE_CODES.has(d.code))) return "parse";
  return "bind";
}
