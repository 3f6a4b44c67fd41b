import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import type { CocoConfig } from "../types/config.js";
import { ConfigurationError } from "../errors.js";
import { validateConfig } from "./validator.js";

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (e) {
    throw new ConfigurationError(`Invalid YAML in ${filePath}`, e instanceof Error ? e.message : String(e));
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Config file must contain a mapping: ${filePath}`);
  }
  return parsed;
}

/** Top-level scalar keys that COCO_* variables may override. */
const ENV_OVERRIDABLE_KEYS = ["schema_version", "state_dir", "build_tool", "kubectl", "target_arch"] as const;

/** Apply COCO_ prefixed environment variable overrides; other COCO_* names are ignored. */
function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const prefix = "COCO_";
  const result = { ...config };
  for (const configKey of ENV_OVERRIDABLE_KEYS) {
    // state_dir ← COCO_STATE_DIR
    const value = env[prefix + configKey.toUpperCase()];
    if (value !== undefined) result[configKey] = value;
  }
  return result;
}

/**
 * Load layered config without validating it: base.yaml ← {env}.yaml ← COCO_* variables.
 */
export function loadRawConfig(
  configDir: string,
  envName?: string,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const dir = path.resolve(configDir);
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    throw new ConfigurationError(`Config directory not found: ${dir}`);
  }

  // Layer 1: base.yaml
  let merged = loadYaml(path.join(dir, "base.yaml"));

  // Layer 2: environment-specific override
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  // Layer 3: environment variables
  return applyEnvOverrides(merged, env);
}

/**
 * Load and validate layered config.
 *
 * Relative paths in the config resolve against the parent of `configDir`.
 */
export async function loadConfig(
  configDir: string,
  envName?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<CocoConfig> {
  const raw = loadRawConfig(configDir, envName, env);
  const res = await validateConfig(raw);
  if (!res.valid) {
    throw new ConfigurationError(`Invalid configuration in ${path.resolve(configDir)}`, res.errors);
  }
  return { ...res.config, root_dir: path.dirname(path.resolve(configDir)) };
}

/** Resolve a config-relative path. */
export function resolvePath(config: Pick<CocoConfig, "root_dir">, p: string): string {
  return path.isAbsolute(p) ? p : path.resolve(config.root_dir, p);
}
