/**
 * Pile runtime values.
 */

export type PileValue = null | boolean | number | string | PileValue[];

export type TypeName = "nil" | "bool" | "number" | "string" | "array";

export function typeName(v: PileValue): TypeName {
  if (v === null) return "nil";
  if (Array.isArray(v)) return "array";
  if (typeof v === "boolean") return "bool";
  if (typeof v === "number") return "number";
  return "string";
}

export function isInteger(v: PileValue): v is number {
  return typeof v === "number" && Number.isInteger(v);
}

/**
 * Text written by print/println. Strings are raw at the top level and quoted
 * inside arrays.
 */
export function displayValue(v: PileValue): string {
  if (typeof v === "string") return v;
  return debugValue(v);
}

/**
 * Text written by trace: like displayValue but strings are always quoted.
 */
export function debugValue(v: PileValue): string {
  if (v === null) return "nil";
  if (Array.isArray(v)) return `[${v.map(debugValue).join(", ")}]`;
  if (typeof v === "string") return JSON.stringify(v);
  return String(v);
}

export function valuesEqual(a: PileValue, b: PileValue): boolean {
  if (a === b) return true;
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false;
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!valuesEqual(a[i] ?? null, b[i] ?? null)) return false;
    }
    return true;
  }
  // NaN is never equal to itself, matching the host number semantics
  return false;
}

export function isTruthy(v: PileValue): boolean {
  if (v === null || v === false || v === 0 || v === "") return false;
  if (Array.isArray(v)) return v.length > 0;
  return true;
}

/**
 * Code points of a string, so length and indexing agree on astral characters.
 */
export function codePoints(s: string): string[] {
  return Array.from(s);
}
