import { PipelineError } from "../core/errors.js";
import { deepMerge } from "../config/merge.js";
import type { UnitConfig } from "../types/unit.js";
import { DEFAULT_EXCLUDED_KEYS, lineageHash, stripExcluded } from "./canonical.js";

export type MasterUnitEntry = Record<string, unknown>;

/** Parsed master parameter list. */
export type MasterList = {
  defaults?: Record<string, unknown>;
  units: MasterUnitEntry[];
};

const NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/** Ids and artifact names become file and directory names. */
function isValidName(name: string): boolean {
  return NAME_PATTERN.test(name) && !name.includes("..");
}

/** `unit_id`, or `<plant_id>_<circuit_id>` for plant/circuit style entries. */
export function resolveUnitId(entry: MasterUnitEntry): string | null {
  if (typeof entry.unit_id === "string" && entry.unit_id.length > 0) return entry.unit_id;
  if (typeof entry.plant_id === "string" && typeof entry.circuit_id === "string") {
    return `${entry.plant_id}_${entry.circuit_id}`;
  }
  return null;
}

export function resolveArtifactName(entry: MasterUnitEntry, unitId: string): string {
  if (typeof entry.artifact_name === "string") return entry.artifact_name;
  if (typeof entry.model_name === "string") return entry.model_name;
  return unitId.toLowerCase().replace(/_/g, "-");
}

/**
 * Expand the master list into one normalized record per unit. Defaults are
 * merged under every entry before hashing, so a change to a default moves
 * the fingerprint of every unit that inherits it.
 */
export function materializeUnits(
  master: MasterList,
  excludeKeys: readonly string[] = DEFAULT_EXCLUDED_KEYS,
): UnitConfig[] {
  const defaults = master.defaults ?? {};
  const seen = new Set<string>();
  const artifactOwners = new Map<string, string>();
  const problems: string[] = [];
  const units: UnitConfig[] = [];

  master.units.forEach((entry, index) => {
    const merged = deepMerge(defaults, entry);
    const unitId = resolveUnitId(merged);
    if (!unitId) {
      problems.push(`units[${index}]: missing unit_id (or plant_id + circuit_id)`);
      return;
    }
    if (!isValidName(unitId)) {
      problems.push(`units[${index}]: invalid unit id '${unitId}'`);
      return;
    }
    if (seen.has(unitId)) {
      problems.push(`units[${index}]: duplicate unit id '${unitId}'`);
      return;
    }
    seen.add(unitId);

    const artifactName = resolveArtifactName(merged, unitId);
    if (!isValidName(artifactName)) {
      problems.push(`units[${index}]: invalid artifact name '${artifactName}'`);
      return;
    }
    const owner = artifactOwners.get(artifactName);
    if (owner !== undefined) {
      problems.push(`units[${index}]: duplicate artifact name '${artifactName}' (also used by '${owner}')`);
      return;
    }
    artifactOwners.set(artifactName, unitId);

    const parameters = stripExcluded(merged, excludeKeys);
    units.push({
      unit_id: unitId,
      artifact_name: artifactName,
      parameters,
      lineage_hash: lineageHash(parameters, excludeKeys),
    });
  });

  if (problems.length > 0) {
    throw new PipelineError("UNITS_INVALID", `Invalid master unit list: ${problems.join("; ")}`, { problems });
  }

  return units;
}

/** Recompute the fingerprint of a single unit entry (e.g. a materialized unit file). */
export function materializeUnit(
  entry: MasterUnitEntry,
  defaults: Record<string, unknown> = {},
  excludeKeys: readonly string[] = DEFAULT_EXCLUDED_KEYS,
): UnitConfig {
  const [unit] = materializeUnits({ defaults, units: [entry] }, excludeKeys);
  if (!unit) throw new PipelineError("UNITS_INVALID", "Unit entry did not materialize");
  return unit;
}
