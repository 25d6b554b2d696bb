/**
 * Pile structural validator.
 * Checks a parsed unit for placement rules the grammar does not express.
 */
import type * as AST from "./ast.js";
import type { Diagnostic } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";

interface Context {
  topLevel: boolean;
  inLoop: boolean;
  inProc: boolean;
}

export function validate(program: AST.Program): Diagnostic[] {
  const diags: Diagnostic[] = [];
  validateBody(program.instructions, { topLevel: true, inLoop: false, inProc: false }, diags);
  return diags;
}

function validateBody(body: AST.Instruction[], ctx: Context, diags: Diagnostic[]): void {
  for (const instr of body) {
    validateInstruction(instr, ctx, diags);
  }
}

function validateInstruction(instr: AST.Instruction, ctx: Context, diags: Diagnostic[]): void {
  const nested: Context = { ...ctx, topLevel: false };

  switch (instr.kind) {
    case "Break":
    case "Continue":
      if (!ctx.inLoop) {
        const word = instr.kind === "Break" ? "break" : "continue";
        diags.push(
          makeDiag(
            instr.kind === "Break" ? "E_BREAK_OUTSIDE_LOOP" : "E_CONTINUE_OUTSIDE_LOOP",
            `'${word}' outside of a loop`,
            instr.span,
            `'${word}' must appear inside a 'loop ... end' block of the same procedure.`
          )
        );
      }
      return;

    case "Return":
      if (!ctx.inProc) {
        diags.push(
          makeDiag(
            "E_RETURN_OUTSIDE_PROC",
            "'return' outside of a procedure",
            instr.span,
            "Use 'exit' to stop the whole program."
          )
        );
      }
      return;

    case "ProcDecl":
    case "DefDecl":
    case "ImportDecl": {
      if (!ctx.topLevel) {
        const word = instr.kind === "ProcDecl" ? "proc" : instr.kind === "DefDecl" ? "def" : "import";
        diags.push(
          makeDiag(
            "E_NESTED_DECL",
            `'${word}' is only allowed at the top level of a file`,
            instr.span,
            `Move the '${word}' out of the enclosing block.`
          )
        );
      }
      if (instr.kind === "DefDecl" && instr.body.length === 0) {
        diags.push(
          makeDiag(
            "E_EMPTY_DEF",
            `definition '${instr.name}' has an empty body`,
            instr.span,
            "A definition body must leave exactly one value on the stack."
          )
        );
      }
      if (instr.kind === "ProcDecl") {
        validateBody(instr.body, { topLevel: false, inLoop: false, inProc: true }, diags);
      } else if (instr.kind === "DefDecl") {
        validateBody(instr.body, { topLevel: false, inLoop: false, inProc: false }, diags);
      }
      return;
    }

    case "AsLetBlock": {
      const seen = new Set<string>();
      for (const name of instr.names) {
        if (seen.has(name)) {
          diags.push(
            makeDiag(
              "E_DUP_BINDING",
              `name '${name}' is bound twice in the same 'as' block`,
              instr.span,
              "Each name in an 'as ... let' list must be distinct."
            )
          );
        }
        seen.add(name);
      }
      validateBody(instr.body, nested, diags);
      return;
    }

    case "LoopBlock":
      validateBody(instr.body, { ...nested, inLoop: true }, diags);
      return;

    case "IfBlock":
      validateBody(instr.thenBody, nested, diags);
      if (instr.elseBody) validateBody(instr.elseBody, nested, diags);
      return;

    case "ArrayBlock":
      validateBody(instr.body, nested, diags);
      return;

    default:
      return;
  }
}
