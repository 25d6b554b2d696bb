/**
 * Pile configuration loader.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { z } from "zod";

export const DEFAULT_MAX_CALL_DEPTH = 1000;

export const configSchema = z
  .object({
    importPaths: z.array(z.string().min(1)).optional(),
    maxCallDepth: z.number().int().positive().optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configSchema>;

export interface PileConfig {
  importPaths: string[];
  maxCallDepth: number;
}

export interface ResolvedConfig {
  config: PileConfig;
  source: "project" | "user" | "default";
  path: string | null;
}

export const DEFAULT_CONFIG: PileConfig = {
  importPaths: [],
  maxCallDepth: DEFAULT_MAX_CALL_DEPTH,
};

/**
 * Resolve the effective configuration.
 * Precedence: ./pile.json > ~/.pile/config.json > defaults
 */
export function resolveConfig(cwd?: string, homeDir?: string): ResolvedConfig {
  const projectPath = path.join(cwd ?? process.cwd(), "pile.json");
  const userPath = path.join(homeDir ?? os.homedir(), ".pile", "config.json");

  const project = tryLoadConfigFile(projectPath);
  if (project) {
    return { config: project, source: "project", path: projectPath };
  }

  const user = tryLoadConfigFile(userPath);
  if (user) {
    return { config: user, source: "user", path: userPath };
  }

  return { config: { ...DEFAULT_CONFIG, importPaths: [] }, source: "default", path: null };
}

export function loadConfig(cwd?: string, homeDir?: string): PileConfig {
  return resolveConfig(cwd, homeDir).config;
}

/**
 * Missing, unreadable and invalid files all yield null so resolution falls
 * through to the next source.
 */
function tryLoadConfigFile(filePath: string): PileConfig | null {
  if (!fs.existsSync(filePath)) return null;
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch {
    return null;
  }
  const parsed = configSchema.safeParse(data);
  if (!parsed.success) return null;
  return normalizeConfig(parsed.data, path.dirname(filePath));
}

/**
 * Fill defaults and resolve relative import paths against the config file's
 * directory.
 */
export function normalizeConfig(file: ConfigFile, baseDir: string): PileConfig {
  return {
    importPaths: (file.importPaths ?? []).map((p) => path.resolve(baseDir, p)),
    maxCallDepth: file.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH,
  };
}
