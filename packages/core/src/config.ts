/**
 * Lode configuration loader.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import type { ExecutionLimits } from "./execution.js";

export interface LodeConfig {
  version: number;
  limits?: ExecutionLimits;
}

export interface ResolvedConfig {
  config: LodeConfig;
  source: "project" | "user" | "default";
  path: string | null;
}

const DEFAULT_CONFIG: LodeConfig = {
  version: 1,
};

const LIMIT_KEYS = ["maxSteps", "timeMs", "maxCallDepth"] as const;

/**
 * Resolve the effective configuration.
 * Precedence: ./.lodeconfig.json > ~/.lode/config.json > default (no limits)
 */
export function resolveConfig(cwd?: string, homeDir?: string): ResolvedConfig {
  const projectPath = path.join(cwd ?? process.cwd(), ".lodeconfig.json");
  const userPath = path.join(homeDir ?? os.homedir(), ".lode", "config.json");

  const projectConfig = tryLoadConfigFile(projectPath);
  if (projectConfig) {
    return { config: projectConfig, source: "project", path: projectPath };
  }

  const userConfig = tryLoadConfigFile(userPath);
  if (userConfig) {
    return { config: userConfig, source: "user", path: userPath };
  }

  return { config: DEFAULT_CONFIG, source: "default", path: null };
}

export function loadConfig(cwd?: string, homeDir?: string): LodeConfig {
  return resolveConfig(cwd, homeDir).config;
}

function tryLoadConfigFile(filePath: string): LodeConfig | null {
  if (!fs.existsSync(filePath)) return null;
  try {
    const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    return validateConfigShape(data);
  } catch (e) {
    // unreadable or invalid files are skipped in favour of the next source
    if (e instanceof SyntaxError || e instanceof ConfigShapeError || isFsError(e)) return null;
    throw e;
  }
}

function isFsError(e: unknown): boolean {
  return e instanceof Error && "code" in e && typeof e.code === "string";
}

export class ConfigShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigShapeError";
  }
}

function isRecord(data: unknown): data is Record<string, unknown> {
  return typeof data === "object" && data !== null && !Array.isArray(data);
}

export function validateConfigShape(data: unknown): LodeConfig {
  if (!isRecord(data)) {
    throw new ConfigShapeError("Config must be a JSON object.");
  }
  const version = typeof data["version"] === "number" ? data["version"] : 1;

  const rawLimits = data["limits"];
  if (rawLimits === undefined) return { version };
  if (!isRecord(rawLimits)) {
    throw new ConfigShapeError("Config 'limits' must be an object when present.");
  }
  const limits: ExecutionLimits = {};
  for (const key of LIMIT_KEYS) {
    const value = rawLimits[key];
    if (value === undefined) continue;
    if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
      throw new ConfigShapeError(`Config 'limits.${key}' must be a non-negative integer.`);
    }
    limits[key] = value;
  }
  return { version, limits };
}

/** File limits overridden by explicitly given values. */
export function mergeLimits(base: ExecutionLimits | undefined, overrides: ExecutionLimits): ExecutionLimits {
  const merged: ExecutionLimits = { ...base };
  for (const key of LIMIT_KEYS) {
    const value = overrides[key];
    if (value !== undefined) merged[key] = value;
  }
  return merged;
}
