import path from "node:path";
import { errorMessage, isPipelineError } from "../core/errors.js";
import { matchManualIds } from "../core/selector.js";
import { materializeUnits } from "../lineage/materializer.js";
import { loadMasterList, writeUnitFiles } from "../lineage/units-file.js";
import type { UnitConfig } from "../types/unit.js";
import { loadContext, type CommandContext, type CommandError, type CommandOptions } from "./context.js";

export type UnitsResult =
  | { ok: true; context: CommandContext; units: UnitConfig[] }
  | { ok: false; error: CommandError };

/** Materialize the master list, optionally narrowed to ids or glob patterns. */
export async function loadUnits(opts: CommandOptions & { unitIds?: string[] }): Promise<UnitsResult> {
  const ctx = await loadContext(opts);
  if (!ctx.ok) return ctx;
  const { context } = ctx;

  try {
    const master = await loadMasterList(context.paths.unitsFile);
    let units = materializeUnits(master, context.config.lineage.exclude_keys);
    if (opts.unitIds && opts.unitIds.length > 0) units = matchManualIds(units, opts.unitIds);
    return { ok: true, context, units };
  } catch (e) {
    return {
      ok: false,
      error: isPipelineError(e)
        ? { code: e.code, message: e.message, detail: e.detail }
        : { code: "UNITS_INVALID", message: errorMessage(e) },
    };
  }
}

export type UnitsCommandResult =
  | { ok: true; units: UnitConfig[]; written: string[] }
  | { ok: false; error: CommandError };

export async function unitsCommand(
  opts: CommandOptions & { unitIds?: string[]; writeDir?: string; now?: () => Date },
): Promise<UnitsCommandResult> {
  const res = await loadUnits(opts);
  if (!res.ok) return res;

  let written: string[] = [];
  if (opts.writeDir) {
    const outDir = path.resolve(res.context.cwd, opts.writeDir);
    const generatedAt = (opts.now ?? (() => new Date()))().toISOString();
    written = writeUnitFiles(res.units, outDir, generatedAt);
  }
  return { ok: true, units: res.units, written };
}
