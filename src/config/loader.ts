import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { deepMerge, isRecord } from "./merge.js";

export const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

export const ENV_PREFIX = "TRAINCTL_";

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  return isRecord(parsed) ? parsed : {};
}

/**
 * Apply TRAINCTL_ prefixed environment variable overrides.
 * TRAINCTL_STATE_DIR → state_dir; a double underscore descends one level
 * (TRAINCTL_SUBMISSION__MAX_IN_FLIGHT → submission.max_in_flight).
 * Values stay strings; the validator coerces them.
 */
export function applyEnvOverrides(
  config: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__").filter((s) => s.length > 0);
    if (segments.length === 0) continue;

    let patch: Record<string, unknown> = { [segments[segments.length - 1] ?? ""]: value };
    for (let i = segments.length - 2; i >= 0; i--) {
      patch = { [segments[i] ?? ""]: patch };
    }
    result = deepMerge(result, patch);
  }
  return result;
}

/**
 * Load layered config: base.yaml ← <envName>.yaml ← environment variables.
 * The result is unvalidated; pass it through validateConfig.
 */
export function loadConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const dir = configDir ?? CONFIG_DIR;

  // Layer 1: base.yaml
  let merged = loadYaml(path.join(dir, "base.yaml"));

  // Layer 2: environment-specific override
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  // Layer 3: environment variables
  return applyEnvOverrides(merged, env);
}
