export type ApprovalKind = "retry" | "promotion";

export type ApprovalDecision = "Approved" | "Rejected";

export type ApprovalOutcome = ApprovalDecision | "TimedOut";

export type ApprovalRequest = {
  request_id: string;
  kind: ApprovalKind;
  subject: string;
  summary: Record<string, unknown>;
  timeout_ms: number;
};

/** Durable record of an approval request and its decision. */
export type ApprovalRecord = {
  schema_version: 1;
  request_id: string;
  kind: ApprovalKind;
  subject: string;
  summary: Record<string, unknown>;
  opened_at: string;
  deadline_at: string;
  decision: ApprovalDecision | null;
  decided_at: string | null;
  decided_by: string | null;
};
