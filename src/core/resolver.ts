import { artifactRef, type Artifact, type ArtifactRef } from "../types/artifact.js";
import type { ArtifactStore } from "../types/services.js";
import type { UnitConfig } from "../types/unit.js";
import { latestVersion } from "../registry/tags.js";

export type Resolution = {
  unit_id: string;
  lineage_hash: string;
  artifact: ArtifactRef | null;
};

/**
 * Latest version of the unit's artifact whose lineage tag matches its
 * current configuration, or null when the configuration has never been
 * trained into `store`.
 */
export async function resolveArtifact(unit: UnitConfig, store: ArtifactStore): Promise<Artifact | null> {
  return latestVersion(await store.list(unit.artifact_name, { lineage_hash: unit.lineage_hash }));
}

export async function resolveAll(units: readonly UnitConfig[], store: ArtifactStore): Promise<Resolution[]> {
  const out: Resolution[] = [];
  for (const unit of units) {
    const found = await resolveArtifact(unit, store);
    out.push({ unit_id: unit.unit_id, lineage_hash: unit.lineage_hash, artifact: found ? artifactRef(found) : null });
  }
  return out;
}
