import { artifactRef, type Artifact, type ArtifactPayload, type ArtifactTags } from "../types/artifact.js";
import type { RegistrationFailure, RegistrationResult } from "../types/run.js";
import type { ArtifactStore } from "../types/services.js";
import type { TrainingJob, UnitConfig } from "../types/unit.js";
import { latestVersion } from "../registry/tags.js";
import { isoAt, type Clock } from "./clock.js";
import { errorMessage, PipelineError } from "./errors.js";
import type { Emitter } from "./progress.js";
import { checkSuccessRatio } from "./threshold.js";

export type RegistrarOptions = {
  minSuccessRatio: number;
  runId: string;
  sourceSha: string | null;
  clock: Clock;
  emit: Emitter;
};

export function artifactTagsFor(job: TrainingJob, environment: string, runId: string, sourceSha: string | null): ArtifactTags {
  const tags: ArtifactTags = {
    unit_id: job.unit_id,
    lineage_hash: job.lineage_hash,
    origin_handle: job.job_handle,
    job_name: job.job_name,
    run_id: runId,
    attempt: String(job.attempt),
    environment,
  };
  if (job.retry_of) {
    tags.retry = "true";
    tags.retry_of = job.retry_of;
  }
  if (sourceSha) tags.source_sha = sourceSha;
  return tags;
}

/**
 * Registers one artifact version per completed job. Failures are isolated
 * per unit, then judged in aggregate: a success ratio below the minimum is
 * a run failure even though some registrations went through.
 */
export class ModelRegistrar {
  constructor(
    private readonly store: ArtifactStore,
    private readonly opts: RegistrarOptions,
  ) {}

  async registerAll(jobs: readonly TrainingJob[], units: readonly UnitConfig[]): Promise<RegistrationResult> {
    const byId = new Map(units.map((u) => [u.unit_id, u]));
    const registered: Artifact[] = [];
    const failures: RegistrationFailure[] = [];

    for (const job of jobs) {
      try {
        const unit = byId.get(job.unit_id);
        if (!unit) throw new Error(`Unit ${job.unit_id} is not part of this run`);
        if (job.status !== "Completed") throw new Error(`Job ${job.job_handle} is ${job.status}, not Completed`);

        const artifact = await this.registerOne(job, unit);
        registered.push(artifact);
        this.opts.emit("register", job.unit_id, "registered", { name: artifact.name, version: artifact.version });
      } catch (e) {
        failures.push({ unit_id: job.unit_id, job_handle: job.job_handle, error: errorMessage(e) });
        this.opts.emit("register", job.unit_id, "failed", { job_handle: job.job_handle, error: errorMessage(e) });
      }
    }

    const check = checkSuccessRatio({ attempted: jobs.length, succeeded: registered.length }, this.opts.minSuccessRatio);
    const result: RegistrationResult = { registered, failures, success_ratio: check.ratio };

    if (!check.pass) {
      throw new PipelineError(
        "REGISTRATION_THRESHOLD",
        `Registered ${registered.length} of ${jobs.length} artifact(s); success ratio ${check.ratio.toFixed(2)} is below the minimum ${this.opts.minSuccessRatio}`,
        { ...result, registered: registered.map(artifactRef), violations: check.violations },
      );
    }
    return result;
  }

  private async registerOne(job: TrainingJob, unit: UnitConfig): Promise<Artifact> {
    // A job registered by an interrupted earlier attempt keeps its version.
    const existing = latestVersion(await this.store.list(unit.artifact_name, { origin_handle: job.job_handle }));
    if (existing) return existing;

    const payload: ArtifactPayload = {
      origin_handle: job.job_handle,
      job_name: job.job_name,
      location: `jobs/${job.job_handle}/outputs/model`,
    };
    const tags = artifactTagsFor(job, this.store.environment, this.opts.runId, this.opts.sourceSha);
    const version = await this.store.createVersion(unit.artifact_name, payload, tags);
    return { name: unit.artifact_name, version, tags, payload, created_at: isoAt(this.opts.clock) };
  }
}
