/**
 * Shared assertion helpers for scenario runner tests.
 */
import * as assert from "node:assert/strict";

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function typeName(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function formatValue(value: unknown): string {
  return value === undefined ? "undefined" : JSON.stringify(value);
}

/**
 * First place where `actual` does not contain `subset`, or null. Objects
 * match on the subset's keys, arrays on the subset's leading items.
 */
function findSubsetMismatch(actual: unknown, subset: unknown, path: string): string | null {
  if (subset === null || typeof subset !== "object") {
    if (!Object.is(actual, subset)) {
      return `${path}: expected ${formatValue(subset)} but got ${formatValue(actual)}`;
    }
    return null;
  }

  if (Array.isArray(subset)) {
    if (!Array.isArray(actual)) {
      return `${path}: expected array but got ${typeName(actual)}`;
    }
    if (actual.length < subset.length) {
      return `${path}: expected at least ${subset.length} items but got ${actual.length}`;
    }
    for (let i = 0; i < subset.length; i++) {
      const mismatch = findSubsetMismatch(actual[i], subset[i], `${path}[${i}]`);
      if (mismatch) return mismatch;
    }
    return null;
  }

  if (!isRecord(actual) || !isRecord(subset)) {
    return `${path}: expected object but got ${typeName(actual)}`;
  }

  for (const key of Object.keys(subset)) {
    if (!Object.prototype.hasOwnProperty.call(actual, key)) {
      return `${path}.${key}: key missing`;
    }
    const mismatch = findSubsetMismatch(actual[key], subset[key], `${path}.${key}`);
    if (mismatch) return mismatch;
  }
  return null;
}

export function assertJsonSubset(actual: unknown, subset: unknown, label: string): void {
  const mismatch = findSubsetMismatch(actual, subset, "$");
  if (mismatch) {
    assert.fail(`${label}: JSON subset mismatch at ${mismatch}`);
  }
}

export function assertMatchesRegex(text: string, pattern: string, label: string): void {
  let re: RegExp;
  try {
    re = new RegExp(pattern);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    assert.fail(`${label}: invalid regex '${pattern}': ${msg}`);
    return;
  }

  assert.ok(re.test(text), `${label}: text did not match regex '${pattern}'. Actual: ${text}`);
}

export function assertContainsAll(text: string, needles: string[], label: string): void {
  const missing = needles.filter((needle) => !text.includes(needle));
  assert.deepEqual(missing, [], `${label}: text is missing ${formatValue(missing)}. Actual: ${text}`);
}

/**
 * JSON.parse that fails the test with the offending text instead of a
 * bare SyntaxError.
 */
export function parseJsonOrFail(text: string, label: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    assert.fail(`${label}: output is not valid JSON: ${text}`);
  }
}
