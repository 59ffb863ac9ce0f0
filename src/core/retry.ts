import type { MonitorResult, RetryOutcome } from "../types/run.js";
import type { ApprovalChannel } from "../types/services.js";
import { isTerminal, type TrainingJob, type UnitConfig } from "../types/unit.js";
import { isPipelineError, PipelineError } from "./errors.js";
import type { JobMonitor } from "./monitor.js";
import type { Emitter } from "./progress.js";
import type { BatchEntry, JobSubmitter } from "./submitter.js";

export type RetryOptions = {
  enabled: boolean;
  approvals: ApprovalChannel;
  approvalTimeoutMs: number;
  submitter: JobSubmitter;
  monitor: JobMonitor;
  emit: Emitter;
  runId: string;
};

export function retryRequestId(runId: string): string {
  return `retry-${runId}`;
}

/**
 * Human-gated retry of failed units. Successful retries extend the original
 * completed set; the original set is never replaced or reduced.
 */
export class RetryCoordinator {
  constructor(private readonly opts: RetryOptions) {}

  async run(original: MonitorResult, units: readonly UnitConfig[]): Promise<RetryOutcome> {
    const { emit } = this.opts;
    const skipped: RetryOutcome = {
      decision: "Skipped",
      resubmitted: [],
      completed: [...original.completed],
      failed: [...original.failed],
      timed_out: [...original.timed_out],
    };
    if (!this.opts.enabled || original.failed.length === 0) return skipped;

    const byId = new Map(units.map((u) => [u.unit_id, u]));
    const entries: BatchEntry[] = original.failed.map((job) => {
      if (!isTerminal(job.status)) {
        throw new PipelineError("RETRY_FAILED", `Cannot retry ${job.unit_id}: attempt ${job.job_handle} is still ${job.status}`);
      }
      const unit = byId.get(job.unit_id);
      if (!unit) throw new PipelineError("RETRY_FAILED", `Cannot retry ${job.unit_id}: unit is not in this run`);
      return { unit, attempt: job.attempt + 1, retryOf: job.job_handle };
    });

    const requestId = retryRequestId(this.opts.runId);
    await this.opts.approvals.open({
      request_id: requestId,
      kind: "retry",
      subject: `Retry ${entries.length} failed unit(s) from run ${this.opts.runId}`,
      summary: {
        run_id: this.opts.runId,
        failed: original.failed.map((j) => ({
          unit_id: j.unit_id,
          job_handle: j.job_handle,
          status: j.status,
          lineage_hash: j.lineage_hash,
        })),
      },
      timeout_ms: this.opts.approvalTimeoutMs,
    });
    emit("retry", null, "awaiting_approval", { request_id: requestId, units: entries.map((e) => e.unit.unit_id) });

    const decision = await this.opts.approvals.waitForDecision(requestId);
    emit("retry", null, decision.toLowerCase(), { request_id: requestId });
    if (decision !== "Approved") return { ...skipped, decision };

    let jobs: TrainingJob[];
    try {
      jobs = await this.opts.submitter.submitBatch(entries);
    } catch (e) {
      if (isPipelineError(e)) throw new PipelineError("RETRY_FAILED", `Retry submission aborted: ${e.message}`, e.detail);
      throw e;
    }

    const retried = await this.opts.monitor.watch(jobs);
    for (const job of retried.completed) emit("retry", job.unit_id, "recovered", { job_handle: job.job_handle });

    return {
      decision,
      resubmitted: [...retried.completed, ...retried.failed, ...retried.timed_out],
      completed: [...original.completed, ...retried.completed],
      failed: retried.failed,
      timed_out: [...original.timed_out, ...retried.timed_out],
    };
  }
}
