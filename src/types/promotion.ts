import type { ArtifactRef } from "./artifact.js";

export type ApprovalState = "Pending" | "Approved" | "Rejected";

export type PropagationState = "NotStarted" | "Copying" | "Confirmed" | "TimedOut";

export type PromotionResolution =
  | "open"
  | "confirmed"
  | "rejected"
  | "approval_timed_out"
  | "propagation_timed_out"
  | "copy_failed";

export type PromotionRequest = {
  request_id: string;
  artifact: ArtifactRef;
  approval_state: ApprovalState;
  propagation_state: PropagationState;
  resolution: PromotionResolution;
  opened_at: string;
  decided_at: string | null;
  confirmed_at: string | null;
  shared_version: number | null;
  error: string | null;
};

export function isResolved(req: PromotionRequest): boolean {
  return req.resolution !== "open";
}
