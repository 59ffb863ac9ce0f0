import { describe, expect, it } from "vitest";
import { ModelRegistrar, artifactTagsFor } from "../src/core/registrar.js";
import { checkSuccessRatio } from "../src/core/threshold.js";
import type { TrainingJob } from "../src/types/unit.js";
import { InMemoryArtifactStore, ManualClock, makeUnits, recorder } from "./support/fakes.js";

const units = makeUnits(["A", "B", "C", "D"]);

function completedJob(unitId: string, overrides: Partial<TrainingJob> = {}): TrainingJob {
  const unit = units.find((u) => u.unit_id === unitId);
  if (!unit) throw new Error(`no unit ${unitId}`);
  return {
    unit_id: unitId,
    job_name: `${unitId}-${unit.lineage_hash}-r1-a1`,
    job_handle: `job-${unitId}`,
    status: "Completed",
    lineage_hash: unit.lineage_hash,
    attempt: 1,
    retry_of: null,
    submitted_at: "2026-01-01T00:00:00.000Z",
    finished_at: "2026-01-01T01:00:00.000Z",
    timed_out: false,
    ...overrides,
  };
}

function registrarFor(store: InMemoryArtifactStore, minSuccessRatio = 0.9, sourceSha: string | null = "abc123") {
  const clock = new ManualClock();
  const rec = recorder(clock);
  return { rec, registrar: new ModelRegistrar(store, { minSuccessRatio, runId: "r1", sourceSha, clock, emit: rec.emit }) };
}

describe("checkSuccessRatio", () => {
  it("passes at or above the minimum", () => {
    expect(checkSuccessRatio({ attempted: 10, succeeded: 9 }, 0.9)).toEqual({ pass: true, ratio: 0.9, violations: [] });
    expect(checkSuccessRatio({ attempted: 0, succeeded: 0 }, 0.9).ratio).toBe(1);
  });

  it("reports the shortfall", () => {
    expect(checkSuccessRatio({ attempted: 3, succeeded: 2 }, 0.9)).toEqual({
      pass: false,
      ratio: 2 / 3,
      violations: [{ metric: "success_ratio", threshold: 0.9, actual: 0.6667 }],
    });
  });
});

describe("artifactTagsFor", () => {
  it("marks retried jobs and records the source revision", () => {
    const job = completedJob("A", { attempt: 2, retry_of: "job-old" });
    expect(artifactTagsFor(job, "dev", "r1", "abc123")).toEqual({
      unit_id: "A",
      lineage_hash: job.lineage_hash,
      origin_handle: "job-A",
      job_name: job.job_name,
      run_id: "r1",
      attempt: "2",
      environment: "dev",
      retry: "true",
      retry_of: "job-old",
      source_sha: "abc123",
    });
    expect(artifactTagsFor(completedJob("A"), "dev", "r1", null)).not.toHaveProperty("retry");
  });
});

describe("ModelRegistrar", () => {
  it("registers one version per completed job", async () => {
    const store = new InMemoryArtifactStore("dev");
    const { rec, registrar } = registrarFor(store);
    const res = await registrar.registerAll([completedJob("A"), completedJob("B")], units);

    expect(res.registered.map((a) => [a.name, a.version])).toEqual([
      ["a", 1],
      ["b", 1],
    ]);
    expect(res.success_ratio).toBe(1);
    expect(res.registered[0]?.payload).toEqual({ origin_handle: "job-A", job_name: completedJob("A").job_name, location: "jobs/job-A/outputs/model" });
    expect((await store.list("a"))[0]?.tags.lineage_hash).toBe(units[0]?.lineage_hash);
    expect(rec.states("register")).toEqual(["A:registered", "B:registered"]);
  });

  it("does not register the same job twice", async () => {
    const store = new InMemoryArtifactStore("dev");
    const { registrar } = registrarFor(store);
    await registrar.registerAll([completedJob("A")], units);
    const again = await registrar.registerAll([completedJob("A")], units);
    expect(again.registered[0]?.version).toBe(1);
    expect(store.count()).toBe(1);
  });

  it("isolates per-unit failures and passes above the threshold", async () => {
    const store = new InMemoryArtifactStore("dev", { failCreate: (name) => name === "b" });
    const { rec, registrar } = registrarFor(store, 0.5);
    const res = await registrar.registerAll([completedJob("A"), completedJob("B"), completedJob("C")], units);

    expect(res.registered.map((a) => a.name)).toEqual(["a", "c"]);
    expect(res.failures).toEqual([{ unit_id: "B", job_handle: "job-B", error: "store unavailable for b" }]);
    expect(rec.states("register")).toEqual(["A:registered", "B:failed", "C:registered"]);
  });

  it("fails the run below the success threshold with per-unit detail", async () => {
    const store = new InMemoryArtifactStore("dev", { failCreate: (name) => name === "b" || name === "c" });
    const { registrar } = registrarFor(store, 0.9);

    await expect(
      registrar.registerAll([completedJob("A"), completedJob("B"), completedJob("C"), completedJob("D")], units),
    ).rejects.toMatchObject({
      code: "REGISTRATION_THRESHOLD",
      detail: {
        success_ratio: 0.5,
        failures: [
          { unit_id: "B", error: "store unavailable for b" },
          { unit_id: "C", error: "store unavailable for c" },
        ],
        registered: [
          { name: "a", version: 1, unit_id: "A" },
          { name: "d", version: 1, unit_id: "D" },
        ],
      },
    });
  });

  it("refuses jobs that did not complete", async () => {
    const store = new InMemoryArtifactStore("dev");
    const { registrar } = registrarFor(store, 0);
    const res = await registrar.registerAll([completedJob("A", { status: "Failed" })], units);
    expect(res.registered).toEqual([]);
    expect(res.failures[0]?.error).toBe("Job job-A is Failed, not Completed");
  });
});
