import type { Artifact, ArtifactTags } from "../types/artifact.js";

export function matchesTags(tags: ArtifactTags, filter?: ArtifactTags): boolean {
  if (!filter) return true;
  return Object.entries(filter).every(([key, value]) => tags[key] === value);
}

/** Most recent version among `artifacts`, or null. */
export function latestVersion(artifacts: readonly Artifact[]): Artifact | null {
  let best: Artifact | null = null;
  for (const a of artifacts) {
    if (!best || a.version > best.version) best = a;
  }
  return best;
}
