export type ArtifactTags = Record<string, string>;

export type ArtifactPayload = {
  origin_handle: string;
  job_name: string;
  location: string;
  promoted_from?: { environment: string; name: string; version: number };
};

/** An immutable artifact version as held by an artifact store. */
export type Artifact = {
  name: string;
  version: number;
  tags: ArtifactTags;
  payload: ArtifactPayload;
  created_at: string;
};

export type ArtifactRef = {
  name: string;
  version: number;
  unit_id: string;
  lineage_hash: string;
};

export function artifactRef(artifact: Artifact): ArtifactRef {
  return {
    name: artifact.name,
    version: artifact.version,
    unit_id: artifact.tags.unit_id ?? "",
    lineage_hash: artifact.tags.lineage_hash ?? "",
  };
}
