/**
 * Pile binder and import resolver.
 *
 * Loads the main unit and everything it imports, merges procedure and
 * definition names into one namespace and checks every name reference
 * before anything runs.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import type * as AST from "./ast.js";
import { childBodies } from "./ast.js";
import { BUILTIN_NAMES } from "./builtins.js";
import type { Diagnostic } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";
import { parse } from "./parser.js";
import { validate } from "./validator.js";

export const SOURCE_EXTENSION = ".pile";

export interface SourceHost {
  /** File contents, or undefined when there is no readable file at the path. */
  readFile(filePath: string): string | undefined;
}

export const nodeSourceHost: SourceHost = {
  readFile(filePath: string): string | undefined {
    if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) return undefined;
    return fs.readFileSync(filePath, "utf-8");
  },
};

export interface Unit {
  /** Absolute resolved path, the unit's identity. */
  id: string;
  /** Path as written in diagnostics. */
  file: string;
  program: AST.Program;
  /** Ids of directly imported units, in import order. */
  imports: string[];
}

export type NameEntry =
  | { kind: "proc"; decl: AST.ProcDecl; unitId: string }
  | { kind: "def"; decl: AST.DefDecl; unitId: string };

export interface Bundle {
  main: Unit;
  units: Map<string, Unit>;
  names: Map<string, NameEntry>;
  variables: Set<string>;
  resolvedImports: Map<AST.ImportDecl, string>;
}

export interface LoadOptions {
  searchPaths?: string[];
  host?: SourceHost;
}

export interface LoadResult {
  bundle?: Bundle;
  diagnostics: Diagnostic[];
}

export function loadFile(entryPath: string, options: LoadOptions = {}): LoadResult {
  const host = options.host ?? nodeSourceHost;
  const source = host.readFile(entryPath);
  if (source === undefined) {
    return {
      diagnostics: [makeDiag("E_IO", `cannot read source file '${entryPath}'`)],
    };
  }
  return loadSource(source, entryPath, options);
}

export function loadSource(source: string, file: string, options: LoadOptions = {}): LoadResult {
  const loader = new Loader(options.host ?? nodeSourceHost, options.searchPaths ?? []);
  const main = loader.loadUnit(path.resolve(file), file, source);
  if (!main || loader.diagnostics.length > 0) {
    return { diagnostics: loader.diagnostics };
  }

  const bundle: Bundle = {
    main,
    units: loader.units,
    names: new Map(),
    variables: new Set(),
    resolvedImports: loader.resolvedImports,
  };
  const diagnostics = [...registerNames(bundle), ...checkReferences(bundle)];
  if (diagnostics.length > 0) {
    return { diagnostics };
  }
  return { bundle, diagnostics: [] };
}

// --- Loading ---

class Loader {
  units = new Map<string, Unit>();
  resolvedImports = new Map<AST.ImportDecl, string>();
  diagnostics: Diagnostic[] = [];
  private failed = new Set<string>();
  private visiting: string[] = [];

  constructor(
    private host: SourceHost,
    private searchPaths: string[]
  ) {}

  loadUnit(id: string, file: string, source: string): Unit | undefined {
    const parsed = parse(source, file);
    const diags = parsed.program ? validate(parsed.program) : parsed.diagnostics;
    if (!parsed.program || diags.length > 0) {
      this.failed.add(id);
      this.diagnostics.push(...diags);
      return undefined;
    }

    const unit: Unit = { id, file, program: parsed.program, imports: [] };
    this.units.set(id, unit);
    this.visiting.push(id);
    for (const instr of parsed.program.instructions) {
      if (instr.kind === "ImportDecl") {
        this.loadImport(unit, instr);
      }
    }
    this.visiting.pop();
    return unit;
  }

  private loadImport(unit: Unit, decl: AST.ImportDecl): void {
    const found = this.resolve(unit.file, decl.path);
    if (!found) {
      this.diagnostics.push(
        makeDiag(
          "E_IMPORT_NOT_FOUND",
          `cannot find imported file '${decl.path}'`,
          decl.span,
          "Import paths resolve against the importing file's directory, then each search path.",
          { path: decl.path }
        )
      );
      return;
    }

    const id = path.resolve(found.file);
    const cycleStart = this.visiting.indexOf(id);
    if (cycleStart >= 0) {
      const chain = [...this.visiting.slice(cycleStart), id].map((u) => this.units.get(u)?.file ?? u);
      this.diagnostics.push(
        makeDiag(
          "E_CYCLIC_IMPORT",
          `cyclic import: ${chain.join(" -> ")}`,
          decl.span,
          "Move the shared procedures into a file that both can import.",
          { chain }
        )
      );
      return;
    }

    this.resolvedImports.set(decl, id);
    unit.imports.push(id);
    if (this.units.has(id) || this.failed.has(id)) return;
    this.loadUnit(id, found.file, found.source);
  }

  private resolve(importerFile: string, importPath: string): { file: string; source: string } | undefined {
    const bases = path.isAbsolute(importPath)
      ? [""]
      : [path.dirname(importerFile), ...this.searchPaths];
    const names = path.extname(importPath) === "" ? [importPath, importPath + SOURCE_EXTENSION] : [importPath];

    for (const base of bases) {
      for (const name of names) {
        const candidate = base === "" ? name : path.join(base, name);
        const source = this.host.readFile(candidate);
        if (source !== undefined) {
          return { file: candidate, source };
        }
      }
    }
    return undefined;
  }
}

// --- Names ---

function duplicate(name: string, span: AST.Span, previous: string): Diagnostic {
  return makeDiag(
    "E_DUPLICATE_DEFINITION",
    `'${name}' is already defined${previous}`,
    span,
    "Every proc, def and let name must be unique across the program and its imports.",
    { name }
  );
}

function registerNames(bundle: Bundle): Diagnostic[] {
  const diags: Diagnostic[] = [];

  for (const unit of bundle.units.values()) {
    for (const instr of unit.program.instructions) {
      if (instr.kind !== "ProcDecl" && instr.kind !== "DefDecl") continue;
      const existing = bundle.names.get(instr.name);
      if (BUILTIN_NAMES.has(instr.name)) {
        diags.push(duplicate(instr.name, instr.nameSpan, " as a builtin"));
      } else if (existing) {
        const at = existing.decl.nameSpan;
        diags.push(duplicate(instr.name, instr.nameSpan, ` at ${at.file}:${at.startLine}:${at.startCol}`));
      } else if (instr.kind === "ProcDecl") {
        bundle.names.set(instr.name, { kind: "proc", decl: instr, unitId: unit.id });
      } else {
        bundle.names.set(instr.name, { kind: "def", decl: instr, unitId: unit.id });
      }
    }
  }

  for (const unit of bundle.units.values()) {
    walk(unit.program.instructions, (instr) => {
      if (instr.kind !== "LetDecl") return;
      const entry = bundle.names.get(instr.name);
      if (BUILTIN_NAMES.has(instr.name)) {
        diags.push(duplicate(instr.name, instr.span, " as a builtin"));
      } else if (entry) {
        diags.push(duplicate(instr.name, instr.span, ` as a ${entry.kind}`));
      } else {
        bundle.variables.add(instr.name);
      }
    });
  }

  return diags;
}

function walk(body: AST.Instruction[], visit: (instr: AST.Instruction) => void): void {
  for (const instr of body) {
    visit(instr);
    for (const child of childBodies(instr)) {
      walk(child, visit);
    }
  }
}

/**
 * Whole-program reference check. Procedures and definitions run with their
 * caller's local frames visible, so inside their bodies any name bound by
 * some `as` block is accepted; the evaluator reports a missing binding then.
 */
function checkReferences(bundle: Bundle): Diagnostic[] {
  const diags: Diagnostic[] = [];
  const anyLocal = new Set<string>();
  for (const unit of bundle.units.values()) {
    walk(unit.program.instructions, (instr) => {
      if (instr.kind === "AsLetBlock") {
        for (const name of instr.names) anyLocal.add(name);
      }
    });
  }

  const isKnown = (name: string, scopes: string[][], dynamic: boolean): boolean =>
    BUILTIN_NAMES.has(name) ||
    bundle.names.has(name) ||
    bundle.variables.has(name) ||
    scopes.some((s) => s.includes(name)) ||
    (dynamic && anyLocal.has(name));

  const check = (body: AST.Instruction[], scopes: string[][], dynamic: boolean): void => {
    for (const instr of body) {
      switch (instr.kind) {
        case "Word":
          if (!isKnown(instr.name, scopes, dynamic)) {
            diags.push(
              makeDiag(
                "E_UNDEFINED_NAME",
                `undefined name '${instr.name}'`,
                instr.span,
                "Declare it with proc, def or let, or import the file that defines it.",
                { name: instr.name }
              )
            );
          }
          break;
        case "AsLetBlock":
          check(instr.body, [...scopes, instr.names], dynamic);
          break;
        case "ProcDecl":
        case "DefDecl":
          check(instr.body, [], true);
          break;
        default:
          for (const child of childBodies(instr)) {
            check(child, scopes, dynamic);
          }
      }
    }
  };

  for (const unit of bundle.units.values()) {
    check(unit.program.instructions, [], false);
  }
  return diags;
}
