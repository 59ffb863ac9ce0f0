/** One independently trainable unit, recomputed on every run. */
export type UnitConfig = {
  unit_id: string;
  artifact_name: string;
  parameters: Record<string, unknown>;
  lineage_hash: string;
};

export const JOB_STATUSES = ["Queued", "Running", "Completed", "Failed", "Canceled"] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set(["Completed", "Failed", "Canceled"]);

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export type TrainingJob = {
  unit_id: string;
  job_name: string;
  job_handle: string;
  status: JobStatus;
  lineage_hash: string;
  attempt: number;
  /** Handle of the failed attempt this job retries, if any. */
  retry_of: string | null;
  submitted_at: string;
  finished_at: string | null;
  /** Still running remotely when the monitor's wait ceiling elapsed. */
  timed_out: boolean;
};
