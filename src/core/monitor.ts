import type { MonitorResult } from "../types/run.js";
import type { ExecutionService } from "../types/services.js";
import { isTerminal, type JobStatus, type TrainingJob } from "../types/unit.js";
import { backoffDelay } from "./backoff.js";
import { isoAt, type Clock } from "./clock.js";
import { errorMessage } from "./errors.js";
import type { Emitter } from "./progress.js";

export type MonitorOptions = {
  initialIntervalMs: number;
  maxIntervalMs: number;
  /** Total wait ceiling; jobs still running then are left running remotely. */
  maxWaitMs: number;
  /** Cadence of the operator-facing still-running notice. */
  heartbeatMs: number;
  clock: Clock;
  emit: Emitter;
};

export function partitionJobs(jobs: readonly TrainingJob[]): MonitorResult {
  return {
    completed: jobs.filter((j) => j.status === "Completed"),
    failed: jobs.filter((j) => j.status === "Failed" || j.status === "Canceled"),
    timed_out: jobs.filter((j) => !isTerminal(j.status) && j.timed_out),
  };
}

/**
 * Polls every outstanding job once per cycle, backing off exponentially
 * between cycles, until all are terminal or the wait ceiling elapses.
 * Terminal states are final: a job is never polled again once it reaches one.
 */
export class JobMonitor {
  constructor(
    private readonly service: ExecutionService,
    private readonly opts: MonitorOptions,
  ) {}

  async watch(jobs: readonly TrainingJob[]): Promise<MonitorResult> {
    const { clock, emit } = this.opts;
    const tracked = jobs.map((j) => ({ ...j }));
    const start = clock.now();
    let lastHeartbeat = start;
    let cycle = 0;
    let pending = tracked.filter((j) => !isTerminal(j.status));

    emit("monitor", null, "started", { jobs: tracked.length, pending: pending.length });

    while (pending.length > 0) {
      for (const job of pending) {
        let status: JobStatus;
        try {
          status = await this.service.getStatus(job.job_handle);
        } catch (e) {
          // A failed status call says nothing about the job; poll it again next cycle.
          emit("monitor", job.unit_id, "status_error", { job_handle: job.job_handle, error: errorMessage(e) });
          continue;
        }
        if (status === job.status) continue;

        job.status = status;
        if (isTerminal(status)) job.finished_at = isoAt(clock);
        emit("monitor", job.unit_id, status.toLowerCase(), { job_handle: job.job_handle });
      }

      pending = pending.filter((j) => !isTerminal(j.status));
      if (pending.length === 0) break;

      const elapsed = clock.now() - start;
      if (elapsed >= this.opts.maxWaitMs) {
        for (const job of pending) {
          job.timed_out = true;
          emit("monitor", job.unit_id, "timed_out", { job_handle: job.job_handle, last_status: job.status });
        }
        break;
      }

      if (clock.now() - lastHeartbeat >= this.opts.heartbeatMs) {
        lastHeartbeat = clock.now();
        emit("monitor", null, "still_running", { pending: pending.map((j) => j.unit_id), elapsed_ms: elapsed });
      }

      const delay = backoffDelay({ initialMs: this.opts.initialIntervalMs, maxMs: this.opts.maxIntervalMs }, cycle);
      await clock.sleep(Math.min(delay, this.opts.maxWaitMs - elapsed));
      cycle++;
    }

    const result = partitionJobs(tracked);
    emit("monitor", null, "finished", {
      completed: result.completed.length,
      failed: result.failed.length,
      timed_out: result.timed_out.length,
    });
    return result;
  }
}
