/**
 * Scenario discovery, loading and filtering.
 *
 * A scenario is a directory holding scenario.json plus the files the
 * command works on. Roots are searched in order; the first directory with a
 * given name wins.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import { validateScenarioConfig } from "./types.js";
import type { ScenarioConfig } from "./types.js";

export const SCENARIO_FILE = "scenario.json";

export interface DiscoveredScenario {
  id: string;
  dir: string;
  relPath: string;
  root: string;
}

export interface LoadedScenario extends DiscoveredScenario {
  config: ScenarioConfig;
}

const IGNORED_DIRS = new Set(["node_modules", "dist", "setup"]);

function walkForScenarios(dir: string, root: string, seen: Map<string, DiscoveredScenario>): void {
  const entries = fs.readdirSync(dir, { withFileTypes: true });

  for (const entry of entries) {
    if (!entry.isDirectory() || IGNORED_DIRS.has(entry.name) || entry.name.startsWith(".")) {
      continue;
    }

    const fullPath = path.join(dir, entry.name);
    if (fs.existsSync(path.join(fullPath, SCENARIO_FILE))) {
      if (!seen.has(entry.name)) {
        seen.set(entry.name, {
          id: entry.name,
          dir: fullPath,
          relPath: path.relative(root, fullPath),
          root,
        });
      }
      // Scenario folders hold fixtures, not nested scenarios
      continue;
    }

    walkForScenarios(fullPath, root, seen);
  }
}

/**
 * Built-in roots followed by any extra roots from a path-delimited list
 * (relative entries resolve against the repository root).
 */
export function getScenarioRoots(repoRoot: string, extraRootsEnv?: string): string[] {
  const roots: string[] = [
    path.join(repoRoot, "scenarios"),
    path.join(repoRoot, "packages", "scenarios", "scenarios"),
  ];

  if (extraRootsEnv) {
    const extras = extraRootsEnv
      .split(path.delimiter)
      .map((s) => s.trim())
      .filter((s) => s.length > 0)
      .map((s) => (path.isAbsolute(s) ? s : path.resolve(repoRoot, s)));

    roots.push(...extras);
  }

  const deduped: string[] = [];
  const seen = new Set<string>();
  for (const root of roots) {
    const normalized = path.resolve(root);
    if (seen.has(normalized)) continue;
    seen.add(normalized);
    deduped.push(normalized);
  }
  return deduped;
}

export function discoverScenarios(roots: string[]): DiscoveredScenario[] {
  const seen = new Map<string, DiscoveredScenario>();
  for (const root of roots) {
    if (!fs.existsSync(root)) continue;
    walkForScenarios(root, root, seen);
  }
  return [...seen.values()].sort((a, b) => a.relPath.localeCompare(b.relPath));
}

export function loadScenario(scenario: DiscoveredScenario): LoadedScenario {
  const raw: unknown = JSON.parse(fs.readFileSync(path.join(scenario.dir, SCENARIO_FILE), "utf-8"));
  return { ...scenario, config: validateScenarioConfig(raw, scenario.id) };
}

export function applyScenarioTextFilter<T extends DiscoveredScenario>(scenarios: T[], filterText?: string): T[] {
  const q = (filterText ?? "").trim().toLowerCase();
  if (!q) return scenarios;
  return scenarios.filter((s) => s.id.toLowerCase().includes(q) || s.relPath.toLowerCase().includes(q));
}

export function parseTagFilter(tagFilter?: string): string[] {
  if (!tagFilter) return [];
  const out: string[] = [];
  for (const raw of tagFilter.split(",")) {
    const tag = raw.trim().toLowerCase();
    if (!tag) continue;
    if (!out.includes(tag)) out.push(tag);
  }
  return out;
}

export function hasAnyRequestedTag(scenarioTags: string[] | undefined, requestedTags: string[]): boolean {
  if (requestedTags.length === 0) return true;
  if (!scenarioTags || scenarioTags.length === 0) return false;
  const normalized = new Set(scenarioTags.map((t) => t.toLowerCase()));
  return requestedTags.some((tag) => normalized.has(tag));
}

/**
 * Every scenario under the roots, loaded and narrowed by the optional
 * text and comma-separated tag filters.
 */
export function selectScenarios(
  roots: string[],
  filters: { text?: string; tags?: string } = {}
): LoadedScenario[] {
  const requestedTags = parseTagFilter(filters.tags);
  return applyScenarioTextFilter(discoverScenarios(roots), filters.text)
    .map(loadScenario)
    .filter((s) => hasAnyRequestedTag(s.config.meta?.tags, requestedTags));
}
