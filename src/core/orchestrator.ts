import crypto from "node:crypto";
import path from "node:path";
import type { TrainctlConfig } from "../types/config.js";
import type { PromotionRequest } from "../types/promotion.js";
import type {
  ProgressSink,
  RunErrorEntry,
  RunMode,
  RunState,
  RunStep,
  RunStepId,
  RunSummary,
  Stage,
} from "../types/run.js";
import type { ApprovalChannel, ArtifactStore, ExecutionService, SourceRevision } from "../types/services.js";
import type { TrainingJob, UnitConfig } from "../types/unit.js";
import { isRecord } from "../config/merge.js";
import { materializeUnits, type MasterList } from "../lineage/materializer.js";
import { atomicWriteJson, readJsonFile } from "../state/durable.js";
import { safePath } from "../state/paths.js";
import { isoAt, type Clock } from "./clock.js";
import { AdmissionControl } from "./concurrency.js";
import { errorMessage, isPipelineError, PipelineError } from "./errors.js";
import { JobMonitor } from "./monitor.js";
import { createEmitter, noopSink, type Emitter } from "./progress.js";
import { PromotionCoordinator } from "./promotion.js";
import { ModelRegistrar } from "./registrar.js";
import { RetryCoordinator } from "./retry.js";
import { selectUnits } from "./selector.js";
import { JobSubmitter } from "./submitter.js";

export const STEP_IDS: readonly RunStepId[] = ["select", "submit", "monitor", "retry", "register", "promote"];

export type PipelineServices = {
  execution: ExecutionService;
  /** Per-environment workspace store: baseline for selection, target of registration. */
  training: ArtifactStore;
  shared: ArtifactStore;
  approvals: ApprovalChannel;
  source?: SourceRevision;
  clock: Clock;
  sink?: ProgressSink;
};

export type RunRequest = {
  mode: RunMode;
  master: MasterList;
  manualUnitIds?: string[];
  /** Resume this run when its state exists, otherwise start it under this id. */
  runId?: string;
};

export type RunResult =
  | { ok: true; summary: RunSummary; statePath: string }
  | {
      ok: false;
      summary: RunSummary;
      statePath: string | null;
      error: { code: string; message: string; detail: unknown };
    };

export function makeRunId(clock: Clock): string {
  const ts = isoAt(clock).replace(/[:.]/g, "-");
  return `${ts}-${crypto.randomBytes(3).toString("hex")}`;
}

export function statePathForRun(stateDir: string, runId: string): string {
  return safePath(path.resolve(stateDir), "runs", runId, "state.json");
}

export function isRunState(value: unknown): value is RunState {
  return (
    isRecord(value) &&
    value.version === 1 &&
    typeof value.run_id === "string" &&
    (value.mode === "auto" || value.mode === "manual") &&
    Array.isArray(value.manual_unit_ids) &&
    Array.isArray(value.steps) &&
    value.steps.every((s) => isRecord(s) && typeof s.id === "string" && typeof s.status === "string") &&
    isRecord(value.outputs)
  );
}

export async function loadRunState(statePath: string): Promise<RunState | null> {
  let raw: unknown;
  try {
    raw = await readJsonFile(statePath);
  } catch (e) {
    throw new PipelineError("STATE_CORRUPT", `Run state is not readable: ${statePath}: ${errorMessage(e)}`);
  }
  if (raw === null) return null;
  if (!isRunState(raw)) throw new PipelineError("STATE_CORRUPT", `Run state is not readable: ${statePath}`);
  return raw;
}

/**
 * Drives one run through select → submit → monitor → retry → register →
 * promote. Every step is checkpointed to state.json; resuming a run skips
 * the steps already recorded as ok and reuses their outputs.
 */
export class Orchestrator {
  private saving: Promise<void> = Promise.resolve();

  constructor(
    private readonly config: TrainctlConfig,
    private readonly services: PipelineServices,
  ) {}

  async run(request: RunRequest): Promise<RunResult> {
    const { clock } = this.services;
    const emit = createEmitter(this.services.sink ?? noopSink, clock);
    const runId = request.runId ?? makeRunId(clock);
    let stage: Stage = "materialize";
    let statePath: string | null = null;
    let state: RunState = this.newState(runId, request);

    try {
      statePath = statePathForRun(this.config.state_dir, runId);
      const existing = await loadRunState(statePath);
      if (existing) {
        state = existing;
        emit("select", null, "resumed", { run_id: runId });
      } else {
        await this.save(statePath, state);
      }
      const checkpoint = statePath;

      const runStep = async (id: RunStepId, fn: () => Promise<void>): Promise<void> => {
        stage = id;
        const step = this.stepOf(state, id);
        if (step.status === "ok" || step.status === "skipped") return;
        step.status = "running";
        step.started_at = isoAt(clock);
        delete step.finished_at;
        delete step.error;
        await this.save(checkpoint, state);
        try {
          await fn();
        } catch (e) {
          step.status = "error";
          step.finished_at = isoAt(clock);
          step.error = { code: isPipelineError(e) ? e.code : "INTERNAL", message: errorMessage(e) };
          await this.save(checkpoint, state);
          throw e;
        }
        step.status = "ok";
        step.finished_at = isoAt(clock);
        await this.save(checkpoint, state);
      };

      const units = this.materialize(request.master, emit);

      await runStep("select", async () => {
        const selection = await selectUnits(
          {
            units,
            mode: state.mode,
            manualUnitIds: state.manual_unit_ids,
            allowFullRetrain: this.config.selection.allow_full_retrain_without_baseline,
          },
          this.services.training,
          emit,
        );
        state.outputs.selected = selection.selected;
      });

      const selected = state.outputs.selected ?? [];
      if (selected.length === 0) {
        for (const step of state.steps) if (step.status === "pending") step.status = "skipped";
        await this.save(checkpoint, state);
        emit("select", null, "nothing_to_do");
        return { ok: true, summary: summarize(state, null), statePath: checkpoint };
      }

      const admission = new AdmissionControl(this.config.submission.max_in_flight);
      const submitter = new JobSubmitter(this.services.execution, {
        admission,
        retryDelaysMs: this.config.submission.retry_delays_seconds.map((s) => s * 1000),
        clock,
        emit,
        runId,
        onSubmitted: async (job) => {
          state.outputs.in_flight = [...(state.outputs.in_flight ?? []), job];
          await this.save(checkpoint, state);
        },
      });
      const monitor = new JobMonitor(this.services.execution, {
        initialIntervalMs: this.config.monitor.initial_interval_seconds * 1000,
        maxIntervalMs: this.config.monitor.max_interval_seconds * 1000,
        maxWaitMs: this.config.monitor.max_wait_seconds * 1000,
        heartbeatMs: this.config.monitor.heartbeat_seconds * 1000,
        clock,
        emit,
      });

      await runStep("submit", async () => {
        await this.cancelInFlight(state, "submit", emit, checkpoint);
        try {
          state.outputs.submitted = await submitter.submitBatch(
            selected.map((unit) => ({ unit, attempt: 1, retryOf: null })),
          );
        } finally {
          delete state.outputs.in_flight;
        }
      });

      await runStep("monitor", async () => {
        state.outputs.monitor = await monitor.watch(state.outputs.submitted ?? []);
      });

      await runStep("retry", async () => {
        await this.cancelInFlight(state, "retry", emit, checkpoint);
        const retry = new RetryCoordinator({
          enabled: this.config.retry.enabled,
          approvals: this.services.approvals,
          approvalTimeoutMs: this.config.retry.approval_timeout_seconds * 1000,
          submitter,
          monitor,
          emit,
          runId,
        });
        try {
          state.outputs.retry = await retry.run(
            state.outputs.monitor ?? { completed: [], failed: [], timed_out: [] },
            selected,
          );
        } finally {
          delete state.outputs.in_flight;
        }
      });

      const completed = state.outputs.retry?.completed ?? [];
      if (completed.length === 0) {
        throw new PipelineError(
          "NO_COMPLETIONS",
          `None of the ${state.outputs.submitted?.length ?? 0} submitted job(s) completed`,
          {
            failed: finalFailed(state).map(jobDetail),
            timed_out: finalTimedOut(state).map(jobDetail),
          },
        );
      }

      await runStep("register", async () => {
        const registrar = new ModelRegistrar(this.services.training, {
          minSuccessRatio: this.config.registration.min_success_ratio,
          runId,
          sourceSha: (await this.services.source?.currentSha()) ?? null,
          clock,
          emit,
        });
        state.outputs.registration = await registrar.registerAll(completed, selected);
      });

      await runStep("promote", async () => {
        const promotions = new Map<string, PromotionRequest>(
          (state.outputs.promotions ?? []).map((p) => [p.request_id, p]),
        );
        const coordinator = new PromotionCoordinator({
          approvals: this.services.approvals,
          shared: this.services.shared,
          sourceEnvironment: this.services.training.environment,
          approvalTimeoutMs: this.config.promotion.approval_timeout_hours * 3_600_000,
          visibility: {
            initialMs: this.config.promotion.visibility.initial_ms,
            maxMs: this.config.promotion.visibility.max_ms,
            ceilingMs: this.config.promotion.visibility.ceiling_ms,
          },
          clock,
          emit,
          onChange: async (req) => {
            promotions.set(req.request_id, req);
            state.outputs.promotions = [...promotions.values()];
            await this.save(checkpoint, state);
          },
        });
        const resolved = await coordinator.promoteAll(state.outputs.registration?.registered ?? [], [
          ...promotions.values(),
        ]);
        state.outputs.promotions = resolved;
      });

      const summary = summarize(state, null);
      emit("promote", null, "finished", { outcome: summary.outcome });
      return { ok: true, summary, statePath: checkpoint };
    } catch (e) {
      const code = isPipelineError(e) ? e.code : "INTERNAL";
      const detail = isPipelineError(e) ? e.detail : null;
      const fatal: RunErrorEntry = { stage, unit_id: null, code, message: errorMessage(e) };
      emit(stage, null, "run_failed", { code, message: fatal.message });
      return {
        ok: false,
        summary: summarize(state, fatal),
        statePath,
        error: { code, message: fatal.message, detail },
      };
    }
  }

  private newState(runId: string, request: RunRequest): RunState {
    const now = isoAt(this.services.clock);
    return {
      version: 1,
      run_id: runId,
      created_at: now,
      updated_at: now,
      mode: request.mode,
      manual_unit_ids: request.manualUnitIds ?? [],
      steps: STEP_IDS.map((id) => ({ id, status: "pending" })),
      outputs: {},
    };
  }

  private stepOf(state: RunState, id: RunStepId): RunStep {
    let step = state.steps.find((s) => s.id === id);
    if (!step) {
      step = { id, status: "pending" };
      state.steps.push(step);
    }
    return step;
  }

  /**
   * Cancel jobs recorded by an interrupted attempt at `stage` before it is
   * run again. A failed cancel is reported and the job is dropped from state.
   */
  private async cancelInFlight(
    state: RunState,
    stage: "submit" | "retry",
    emit: Emitter,
    checkpoint: string,
  ): Promise<void> {
    const leftover = state.outputs.in_flight ?? [];
    if (leftover.length === 0) return;
    for (const job of leftover) {
      try {
        await this.services.execution.cancel(job.job_handle);
        emit(stage, job.unit_id, "cancelled", { job_handle: job.job_handle, reason: "resumed" });
      } catch (e) {
        emit(stage, job.unit_id, "cancel_failed", { job_handle: job.job_handle, error: errorMessage(e) });
      }
    }
    delete state.outputs.in_flight;
    await this.save(checkpoint, state);
  }

  private materialize(master: MasterList, emit: Emitter): UnitConfig[] {
    const units = materializeUnits(master, this.config.lineage.exclude_keys);
    for (const unit of units) emit("materialize", unit.unit_id, "materialized", { lineage_hash: unit.lineage_hash });
    return units;
  }

  /** Checkpoint writes are serialized; promotion requests report changes concurrently. */
  private save(statePath: string, state: RunState): Promise<void> {
    const next = this.saving.then(() => {
      state.updated_at = isoAt(this.services.clock);
      return atomicWriteJson(statePath, state);
    });
    this.saving = next.catch(() => undefined);
    return next;
  }
}

function finalFailed(state: RunState): TrainingJob[] {
  return state.outputs.retry?.failed ?? state.outputs.monitor?.failed ?? [];
}

function finalTimedOut(state: RunState): TrainingJob[] {
  return state.outputs.retry?.timed_out ?? state.outputs.monitor?.timed_out ?? [];
}

function jobDetail(job: TrainingJob) {
  return { unit_id: job.unit_id, job_handle: job.job_handle, status: job.status };
}

const PROMOTION_ERROR_CODES: Partial<Record<PromotionRequest["resolution"], string>> = {
  approval_timed_out: "APPROVAL_TIMED_OUT",
  propagation_timed_out: "PROPAGATION_TIMED_OUT",
  copy_failed: "COPY_FAILED",
};

/** Per-unit problems that did not stop the run. */
export function collectRunErrors(state: RunState): RunErrorEntry[] {
  const errors: RunErrorEntry[] = [];
  const failedStage: Stage = state.outputs.retry?.decision === "Approved" ? "retry" : "monitor";

  for (const job of finalFailed(state)) {
    errors.push({
      stage: failedStage,
      unit_id: job.unit_id,
      code: "JOB_FAILED",
      message: `Job ${job.job_handle} ended ${job.status}`,
    });
  }
  for (const job of finalTimedOut(state)) {
    errors.push({
      stage: "monitor",
      unit_id: job.unit_id,
      code: "JOB_TIMED_OUT",
      message: `Job ${job.job_handle} was still ${job.status} when the wait ceiling elapsed`,
    });
  }
  for (const failure of state.outputs.registration?.failures ?? []) {
    errors.push({ stage: "register", unit_id: failure.unit_id, code: "REGISTRATION_FAILED", message: failure.error });
  }
  for (const req of state.outputs.promotions ?? []) {
    const code = PROMOTION_ERROR_CODES[req.resolution] ?? (req.error ? "PROMOTION_ERROR" : null);
    if (!code) continue;
    errors.push({
      stage: "promote",
      unit_id: req.artifact.unit_id,
      code,
      message: req.error ?? `${req.artifact.name} v${req.artifact.version}: ${req.resolution.replace(/_/g, " ")}`,
    });
  }
  return errors;
}

export function summarize(state: RunState, fatal: RunErrorEntry | null): RunSummary {
  const selected = state.outputs.selected ?? [];
  const promotions = state.outputs.promotions ?? [];
  const errors = collectRunErrors(state);
  if (fatal) errors.push(fatal);

  let outcome: RunSummary["outcome"];
  if (fatal) outcome = "failed";
  else if (selected.length === 0) outcome = "nothing_to_do";
  else outcome = errors.length === 0 ? "completed" : "completed_with_errors";

  const promoted = promotions.filter((p) => p.resolution === "confirmed").length;
  const rejected = promotions.filter((p) => p.resolution === "rejected").length;

  return {
    run_id: state.run_id,
    mode: state.mode,
    outcome,
    selected: selected.map((u) => u.unit_id),
    submitted: state.outputs.submitted?.length ?? 0,
    completed: state.outputs.monitor?.completed.length ?? 0,
    retried: state.outputs.retry?.resubmitted.length ?? 0,
    failed: finalFailed(state).length,
    timed_out: finalTimedOut(state).length,
    registered: state.outputs.registration?.registered.length ?? 0,
    promoted,
    rejected,
    pending: promotions.length - promoted - rejected,
    errors,
  };
}
