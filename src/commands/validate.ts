import path from "node:path";
import { FileApprovalChannel } from "../approvals/file-channel.js";
import { loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { errorMessage, isPipelineError } from "../core/errors.js";
import { expandTemplate } from "../execution/command-service.js";
import { materializeUnits } from "../lineage/materializer.js";
import { loadMasterList } from "../lineage/units-file.js";
import type { TrainctlConfig } from "../types/config.js";
import { resolvePaths, type CommandOptions } from "./context.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type ValidateResult = { ok: true; units: number; diagnostics: Diagnostic[] } | { ok: false; errors: Diagnostic[] };

function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

const PLACEHOLDERS: Record<keyof TrainctlConfig["execution"], string[]> = {
  submit: ["job_name", "unit_id", "lineage_hash", "params_file"],
  status: ["handle"],
  cancel: ["handle"],
};

function checkTemplates(config: TrainctlConfig): Diagnostic[] {
  const out: Diagnostic[] = [];
  for (const op of ["submit", "status", "cancel"] as const) {
    try {
      expandTemplate(config.execution[op], Object.fromEntries(PLACEHOLDERS[op].map((n) => [n, n])));
    } catch (e) {
      out.push(diag("error", "TEMPLATE_INVALID", `execution.${op}: ${errorMessage(e)}`));
    }
  }
  return out;
}

/**
 * Check config, execution templates, the master unit list and stored
 * approval records without running anything.
 */
export async function validateAll(opts: CommandOptions): Promise<ValidateResult> {
  const cwd = opts.cwd ?? process.cwd();
  const configDir = path.resolve(cwd, opts.configDir);
  const errors: Diagnostic[] = [];
  const diagnostics: Diagnostic[] = [];

  const res = await validateConfig(loadConfig(opts.env, configDir, opts.environ ?? process.env));
  if (!res.valid) {
    return { ok: false, errors: [diag("error", "CONFIG_INVALID", `Config invalid (${configDir}): ${res.errors}`, { path: configDir })] };
  }
  const config = res.config;
  const paths = resolvePaths(config, cwd);
  errors.push(...checkTemplates(config));

  let units = 0;
  try {
    const master = await loadMasterList(paths.unitsFile);
    units = materializeUnits(master, config.lineage.exclude_keys).length;
    diagnostics.push(diag("info", "UNITS_OK", `${units} unit(s) in ${path.relative(cwd, paths.unitsFile)}`, { path: paths.unitsFile }));
  } catch (e) {
    const details = isPipelineError(e) && e.detail !== null ? { detail: e.detail } : undefined;
    errors.push(diag("error", isPipelineError(e) ? e.code : "UNITS_INVALID", errorMessage(e), { path: paths.unitsFile, details }));
  }

  try {
    const { records, invalid } = await new FileApprovalChannel({ dir: paths.approvalsDir }).list();
    for (const bad of invalid) errors.push(diag("error", "APPROVAL_RECORD_INVALID", bad.error, { path: bad.file }));
    const open = records.filter((r) => r.decision === null).length;
    if (open > 0) diagnostics.push(diag("info", "APPROVALS_OPEN", `${open} approval request(s) awaiting a decision`));
  } catch (e) {
    errors.push(diag("error", "APPROVAL_RECORD_INVALID", errorMessage(e), { path: paths.approvalsDir }));
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, units, diagnostics };
}
