import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import type { TrainctlConfig } from "../types/config.js";

export type CommandOptions = {
  configDir: string;
  env?: string;
  cwd?: string;
  environ?: NodeJS.ProcessEnv;
};

export type ResolvedPaths = {
  unitsFile: string;
  stateDir: string;
  approvalsDir: string;
  trainingStore: string;
  sharedStore: string;
  paramsDir: string;
};

export type CommandContext = {
  cwd: string;
  config: TrainctlConfig;
  paths: ResolvedPaths;
};

export type CommandError = { code: string; message: string; detail?: unknown };

export type ContextResult = { ok: true; context: CommandContext } | { ok: false; error: CommandError };

/** Paths in config are relative to the working directory; `{environment}` names the configured environment. */
export function resolvePaths(config: TrainctlConfig, cwd: string): ResolvedPaths {
  const at = (p: string) => path.resolve(cwd, p.replace(/\{environment\}/g, config.environment));
  const stateDir = at(config.state_dir);
  return {
    unitsFile: at(config.units_file),
    stateDir,
    approvalsDir: at(config.approvals_dir),
    trainingStore: at(config.stores.training),
    sharedStore: at(config.stores.shared),
    paramsDir: path.join(stateDir, "params"),
  };
}

export async function loadContext(opts: CommandOptions): Promise<ContextResult> {
  const cwd = opts.cwd ?? process.cwd();
  const configDir = path.resolve(cwd, opts.configDir);
  const raw = loadConfig(opts.env, configDir, opts.environ ?? process.env);
  const res = await validateConfig(raw);
  if (!res.valid) {
    return { ok: false, error: { code: "CONFIG_INVALID", message: `Config invalid (${configDir}): ${res.errors}` } };
  }
  return { ok: true, context: { cwd, config: res.config, paths: resolvePaths(res.config, cwd) } };
}
