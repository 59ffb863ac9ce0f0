import { minimatch } from "minimatch";
import type { RunMode } from "../types/run.js";
import type { ArtifactStore } from "../types/services.js";
import type { UnitConfig } from "../types/unit.js";
import { PipelineError } from "./errors.js";
import type { Emitter } from "./progress.js";

export type SelectionRequest = {
  units: UnitConfig[];
  mode: RunMode;
  manualUnitIds?: string[];
  /** Operator opt-in to train every unit when no prior artifact exists. */
  allowFullRetrain?: boolean;
};

export type SelectionResult = {
  selected: UnitConfig[];
  up_to_date: string[];
  first_run: boolean;
};

/**
 * Resolve a manual list (exact ids or glob patterns) against the configured
 * units. Every entry must match something; unknown entries fail the run.
 */
export function matchManualIds(units: UnitConfig[], entries: string[]): UnitConfig[] {
  const wanted = entries.map((e) => e.trim()).filter((e) => e.length > 0);
  if (wanted.length === 0) {
    throw new PipelineError("UNKNOWN_UNITS", "Manual mode requires at least one unit id", { unknown: [] });
  }

  const unknown: string[] = [];
  const picked = new Set<string>();
  for (const entry of wanted) {
    const hits = units.filter((u) => u.unit_id === entry || minimatch(u.unit_id, entry));
    if (hits.length === 0) unknown.push(entry);
    for (const hit of hits) picked.add(hit.unit_id);
  }

  if (unknown.length > 0) {
    throw new PipelineError("UNKNOWN_UNITS", `Unknown unit ids: ${unknown.join(", ")}`, { unknown });
  }

  // Keep master-list order regardless of the order ids were given in.
  return units.filter((u) => picked.has(u.unit_id));
}

/** True when any configured unit already has a registered artifact. */
export async function hasBaseline(units: UnitConfig[], store: ArtifactStore): Promise<boolean> {
  for (const unit of units) {
    const versions = await store.list(unit.artifact_name);
    if (versions.length > 0) return true;
  }
  return false;
}

/**
 * Decide which units need (re)training. Auto mode compares each unit's
 * current lineage hash with the hashes tagged on its registered artifacts;
 * a unit with a matching artifact is up to date.
 */
export async function selectUnits(
  request: SelectionRequest,
  store: ArtifactStore,
  emit: Emitter,
): Promise<SelectionResult> {
  if (request.mode === "manual") {
    const selected = matchManualIds(request.units, request.manualUnitIds ?? []);
    for (const unit of selected) emit("select", unit.unit_id, "selected_manual", { lineage_hash: unit.lineage_hash });
    return { selected, up_to_date: [], first_run: false };
  }

  if (!(await hasBaseline(request.units, store))) {
    if (!request.allowFullRetrain) {
      throw new PipelineError(
        "BASELINE_OPT_IN_REQUIRED",
        `No registered artifacts found in '${store.environment}'; refusing to train all ${request.units.length} units without explicit opt-in`,
        { units: request.units.map((u) => u.unit_id) },
      );
    }
    emit("select", null, "first_run_full_retrain", { units: request.units.length });
    for (const unit of request.units) emit("select", unit.unit_id, "selected_first_run", { lineage_hash: unit.lineage_hash });
    return { selected: [...request.units], up_to_date: [], first_run: true };
  }

  const selected: UnitConfig[] = [];
  const upToDate: string[] = [];
  for (const unit of request.units) {
    const matches = await store.list(unit.artifact_name, { lineage_hash: unit.lineage_hash });
    if (matches.length === 0) {
      selected.push(unit);
      emit("select", unit.unit_id, "changed", { lineage_hash: unit.lineage_hash });
    } else {
      upToDate.push(unit.unit_id);
      emit("select", unit.unit_id, "up_to_date", { lineage_hash: unit.lineage_hash });
    }
  }

  return { selected, up_to_date: upToDate, first_run: false };
}
