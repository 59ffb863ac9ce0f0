import type { ExecutionService, SubmitRequest } from "../types/services.js";
import type { TrainingJob, UnitConfig } from "../types/unit.js";
import { scheduledDelay } from "./backoff.js";
import { isoAt, type Clock } from "./clock.js";
import type { AdmissionControl } from "./concurrency.js";
import { errorMessage, PipelineError } from "./errors.js";
import type { Emitter } from "./progress.js";

export type SubmitterOptions = {
  admission: AdmissionControl;
  /** Wait before each extra attempt; the length is the retry budget. */
  retryDelaysMs: number[];
  clock: Clock;
  emit: Emitter;
  runId: string;
  /** Called with each job as soon as its handle is returned, before the batch settles. */
  onSubmitted?: (job: TrainingJob) => Promise<void> | void;
};

export type BatchEntry = {
  unit: UnitConfig;
  attempt: number;
  retryOf: string | null;
};

export type SubmissionFailure = {
  unit_id: string;
  attempts: number;
  error: string;
};

type SubmitOutcome =
  | { kind: "ok"; job: TrainingJob; tries: number }
  | { kind: "failed"; failure: SubmissionFailure }
  | { kind: "skipped" };

export function jobNameFor(runId: string, unit: UnitConfig, attempt: number): string {
  return `${unit.unit_id}-${unit.lineage_hash}-${runId}-a${attempt}`;
}

/**
 * Submits one training job per entry through the admission cap. A batch is
 * all-or-nothing: when any unit exhausts its submission retries, every job
 * already submitted in the batch is cancelled and the batch is aborted.
 */
export class JobSubmitter {
  constructor(
    private readonly service: ExecutionService,
    private readonly opts: SubmitterOptions,
  ) {}

  async submitBatch(entries: BatchEntry[]): Promise<TrainingJob[]> {
    const outcomes: SubmitOutcome[] = entries.map(() => ({ kind: "skipped" }));
    const abort = new AbortController();
    const checkpointFailures: SubmissionFailure[] = [];

    await Promise.all(
      entries.map((entry, index) =>
        this.opts.admission.run(async () => {
          if (abort.signal.aborted) return;
          const outcome = await this.submitWithRetry(entry, abort.signal);
          outcomes[index] = outcome;
          if (outcome.kind === "failed") {
            abort.abort();
          } else if (outcome.kind === "ok" && this.opts.onSubmitted) {
            try {
              await this.opts.onSubmitted(outcome.job);
            } catch (e) {
              checkpointFailures.push({
                unit_id: entry.unit.unit_id,
                attempts: outcome.tries,
                error: `Could not record ${outcome.job.job_handle}: ${errorMessage(e)}`,
              });
              abort.abort();
            }
          }
        }),
      ),
    );

    const submitted: TrainingJob[] = [];
    const failures: SubmissionFailure[] = [];
    const skipped: string[] = [];
    outcomes.forEach((outcome, index) => {
      if (outcome.kind === "ok") submitted.push(outcome.job);
      else if (outcome.kind === "failed") failures.push(outcome.failure);
      else skipped.push(entries[index]?.unit.unit_id ?? "");
    });
    failures.push(...checkpointFailures);

    if (failures.length === 0) return submitted;

    const cancelled: string[] = [];
    const cancelFailures: Array<{ job_handle: string; error: string }> = [];
    for (const job of submitted) {
      try {
        await this.service.cancel(job.job_handle);
        cancelled.push(job.job_handle);
        this.opts.emit("submit", job.unit_id, "cancelled", { job_handle: job.job_handle });
      } catch (e) {
        cancelFailures.push({ job_handle: job.job_handle, error: errorMessage(e) });
        this.opts.emit("submit", job.unit_id, "cancel_failed", { job_handle: job.job_handle, error: errorMessage(e) });
      }
    }

    throw new PipelineError(
      "SUBMISSION_ABORTED",
      `Submission failed for ${failures.map((f) => f.unit_id).join(", ")}; cancelled ${cancelled.length} of ${submitted.length} submitted job(s)`,
      { failures, cancelled, cancel_failures: cancelFailures, skipped },
    );
  }

  private async submitWithRetry(entry: BatchEntry, signal: AbortSignal): Promise<SubmitOutcome> {
    const { unit, attempt, retryOf } = entry;
    const jobName = jobNameFor(this.opts.runId, unit, attempt);
    const tags: Record<string, string> = {
      unit_id: unit.unit_id,
      lineage_hash: unit.lineage_hash,
      run_id: this.opts.runId,
      attempt: String(attempt),
    };
    if (retryOf) tags.retry_of = retryOf;
    const request: SubmitRequest = { job_name: jobName, unit_id: unit.unit_id, parameters: unit.parameters, tags };

    const maxTries = this.opts.retryDelaysMs.length + 1;
    let lastError = "";

    for (let tryIndex = 0; tryIndex < maxTries; tryIndex++) {
      if (tryIndex > 0) {
        if (signal.aborted) return { kind: "skipped" };
        const delay = scheduledDelay(this.opts.retryDelaysMs, tryIndex - 1);
        this.opts.emit("submit", unit.unit_id, "retrying", { try: tryIndex + 1, delay_ms: delay, error: lastError });
        await this.opts.clock.sleep(delay, signal);
        if (signal.aborted) return { kind: "skipped" };
      }

      try {
        const handle = await this.service.submit(request);
        this.opts.emit("submit", unit.unit_id, "submitted", { job_handle: handle, attempt });
        return {
          kind: "ok",
          tries: tryIndex + 1,
          job: {
            unit_id: unit.unit_id,
            job_name: jobName,
            job_handle: handle,
            status: "Queued",
            lineage_hash: unit.lineage_hash,
            attempt,
            retry_of: retryOf,
            submitted_at: isoAt(this.opts.clock),
            finished_at: null,
            timed_out: false,
          },
        };
      } catch (e) {
        lastError = errorMessage(e);
      }
    }

    this.opts.emit("submit", unit.unit_id, "failed", { tries: maxTries, error: lastError });
    return { kind: "failed", failure: { unit_id: unit.unit_id, attempts: maxTries, error: lastError } };
  }
}
