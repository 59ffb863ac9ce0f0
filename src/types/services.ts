import type { ApprovalDecision, ApprovalOutcome, ApprovalRecord, ApprovalRequest } from "./approval.js";
import type { Artifact, ArtifactPayload, ArtifactTags } from "./artifact.js";
import type { JobStatus } from "./unit.js";

export type SubmitRequest = {
  job_name: string;
  unit_id: string;
  parameters: Record<string, unknown>;
  tags: Record<string, string>;
};

/** External system that runs training jobs. */
export interface ExecutionService {
  submit(request: SubmitRequest): Promise<string>;
  getStatus(handle: string): Promise<JobStatus>;
  cancel(handle: string): Promise<void>;
}

/** Versioned artifact store (per-environment workspace or shared registry). */
export interface ArtifactStore {
  readonly environment: string;
  createVersion(name: string, payload: ArtifactPayload, tags: ArtifactTags): Promise<number>;
  /** Versions of `name` whose tags include every entry of `tagFilter`, ascending by version. */
  list(name: string, tagFilter?: ArtifactTags): Promise<Artifact[]>;
  get(name: string, version: number): Promise<Artifact | null>;
}

/** Durable human approval channel. */
export interface ApprovalChannel {
  /** Open a request, or return the existing record when one was opened earlier. */
  open(request: ApprovalRequest): Promise<ApprovalRecord>;
  waitForDecision(requestId: string): Promise<ApprovalOutcome>;
  decide(requestId: string, decision: ApprovalDecision, decidedBy: string): Promise<ApprovalRecord>;
}

export interface SourceRevision {
  currentSha(): Promise<string | null>;
}
