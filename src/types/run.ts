import type { Artifact } from "./artifact.js";
import type { PromotionRequest } from "./promotion.js";
import type { TrainingJob, UnitConfig } from "./unit.js";

export type RunMode = "auto" | "manual";

export type Stage = "materialize" | "select" | "submit" | "monitor" | "retry" | "register" | "promote" | "resolve";

export type ProgressEvent = {
  unit_id: string | null;
  stage: Stage;
  state: string;
  timestamp: string;
  detail?: Record<string, unknown>;
};

export type ProgressSink = (event: ProgressEvent) => void;

export type RunErrorEntry = {
  stage: Stage;
  unit_id: string | null;
  code: string;
  message: string;
};

export type RunOutcome = "nothing_to_do" | "completed" | "completed_with_errors";

export type RunSummary = {
  run_id: string;
  mode: RunMode;
  outcome: RunOutcome | "failed";
  selected: string[];
  submitted: number;
  completed: number;
  retried: number;
  failed: number;
  timed_out: number;
  registered: number;
  promoted: number;
  rejected: number;
  pending: number;
  errors: RunErrorEntry[];
};

export type MonitorResult = {
  completed: TrainingJob[];
  failed: TrainingJob[];
  timed_out: TrainingJob[];
};

export type RetryOutcome = {
  decision: "Skipped" | "Approved" | "Rejected" | "TimedOut";
  resubmitted: TrainingJob[];
  completed: TrainingJob[];
  failed: TrainingJob[];
  timed_out: TrainingJob[];
};

export type RegistrationFailure = {
  unit_id: string;
  job_handle: string;
  error: string;
};

export type RegistrationResult = {
  registered: Artifact[];
  failures: RegistrationFailure[];
  success_ratio: number;
};

export type RunStepId = "select" | "submit" | "monitor" | "retry" | "register" | "promote";

export type RunStepStatus = "pending" | "running" | "ok" | "error" | "skipped";

export type RunStep = {
  id: RunStepId;
  status: RunStepStatus;
  started_at?: string;
  finished_at?: string;
  error?: { code: string; message: string };
};

/** Checkpointed state persisted to <state_dir>/runs/<run_id>/state.json. */
export type RunState = {
  version: 1;
  run_id: string;
  created_at: string;
  updated_at: string;
  mode: RunMode;
  manual_unit_ids: string[];
  steps: RunStep[];
  outputs: {
    selected?: UnitConfig[];
    /** Jobs handed out by a submit or retry step that has not finished yet. */
    in_flight?: TrainingJob[];
    submitted?: TrainingJob[];
    monitor?: MonitorResult;
    retry?: RetryOutcome;
    registration?: RegistrationResult;
    promotions?: PromotionRequest[];
  };
};
