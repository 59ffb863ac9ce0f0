import { describe, expect, it, vi } from "vitest";
import { AdmissionControl } from "../src/core/concurrency.js";
import { JobSubmitter, jobNameFor, type SubmitterOptions } from "../src/core/submitter.js";
import type { ExecutionService } from "../src/types/services.js";
import {
  FakeExecutionService,
  ManualClock,
  T0,
  makeUnits,
  recorder,
  type FakeExecutionOptions,
} from "./support/fakes.js";

const units = makeUnits(["A", "B", "C", "D", "E"]);
const entries = (ids: string[]) =>
  units.filter((u) => ids.includes(u.unit_id)).map((unit) => ({ unit, attempt: 1, retryOf: null }));

function setup(capacity: number, opts: FakeExecutionOptions = {}, extra: Partial<SubmitterOptions> = {}) {
  const clock = new ManualClock();
  const exec = new FakeExecutionService(opts);
  const rec = recorder(clock);
  const submitter = new JobSubmitter(exec, {
    admission: new AdmissionControl(capacity),
    retryDelaysMs: [30_000, 60_000],
    clock,
    emit: rec.emit,
    runId: "r1",
    ...extra,
  });
  return { clock, exec, rec, submitter };
}

describe("JobSubmitter", () => {
  it("submits one queued job per unit with provenance tags", async () => {
    const { exec, submitter } = setup(5);
    const jobs = await submitter.submitBatch(entries(["A", "B"]));
    const a = units[0];
    if (!a) throw new Error("fixture");

    expect(jobs.map((j) => [j.unit_id, j.status, j.attempt, j.retry_of])).toEqual([
      ["A", "Queued", 1, null],
      ["B", "Queued", 1, null],
    ]);
    expect(jobs[0]?.job_name).toBe(jobNameFor("r1", a, 1));
    expect(jobs[0]?.job_name).toBe(`A-${a.lineage_hash}-r1-a1`);
    expect(exec.submitted[0]?.tags).toEqual({ unit_id: "A", lineage_hash: a.lineage_hash, run_id: "r1", attempt: "1" });
    expect(exec.submitted[0]?.parameters).toEqual(a.parameters);
  });

  it("keeps submission calls within the admission cap", async () => {
    const { exec, submitter } = setup(2);
    const jobs = await submitter.submitBatch(entries(["A", "B", "C", "D", "E"]));
    expect(jobs).toHaveLength(5);
    expect(exec.maxInFlight).toBe(2);
  });

  it("retries a transient submission failure on the configured schedule", async () => {
    const { clock, exec, rec, submitter } = setup(5, {
      failSubmit: (req, call) => req.unit_id === "B" && call === 1,
    });
    const jobs = await submitter.submitBatch(entries(["A", "B", "C"]));
    expect(jobs.map((j) => j.unit_id)).toEqual(["A", "B", "C"]);
    expect(clock.sleeps).toEqual([30_000]);
    expect(exec.submitCalls.filter((n) => n.startsWith("B-"))).toHaveLength(2);
    expect(rec.states("submit")).toContain("B:retrying");
  });

  it("aborts the batch and cancels submitted jobs when retries are exhausted", async () => {
    const { clock, exec, rec, submitter } = setup(5, { failSubmit: (req) => req.unit_id === "B" });

    await expect(submitter.submitBatch(entries(["A", "B", "C"]))).rejects.toMatchObject({
      code: "SUBMISSION_ABORTED",
      detail: {
        failures: [{ unit_id: "B", attempts: 3, error: "submit rejected for B" }],
        cancel_failures: [],
        skipped: [],
      },
    });
    expect(clock.sleeps).toEqual([30_000, 60_000]);
    expect([...exec.cancelled].sort()).toEqual(["job-1", "job-2"]);
    expect(rec.states("submit").filter((s) => s.endsWith(":cancelled"))).toHaveLength(2);
  });

  it("skips units still waiting for a slot once the batch aborts", async () => {
    const { exec, submitter } = setup(1, { failSubmit: (req) => req.unit_id === "B" });
    await expect(submitter.submitBatch(entries(["A", "B", "C"]))).rejects.toMatchObject({
      code: "SUBMISSION_ABORTED",
      detail: { cancelled: ["job-1"], skipped: ["C"] },
    });
    expect(exec.submitCalls.some((n) => n.startsWith("C-"))).toBe(false);
  });

  it("reports jobs it could not cancel", async () => {
    const { submitter } = setup(1, {
      failSubmit: (req) => req.unit_id === "B",
      failCancel: (handle) => handle === "job-1",
    });
    await expect(submitter.submitBatch(entries(["A", "B"]))).rejects.toMatchObject({
      detail: { cancelled: [], cancel_failures: [{ job_handle: "job-1", error: "cancel failed for job-1" }] },
    });
  });

  it("tags retried attempts with the handle they replace", async () => {
    const { exec, submitter } = setup(5);
    const b = units[1];
    if (!b) throw new Error("fixture");
    const [job] = await submitter.submitBatch([{ unit: b, attempt: 2, retryOf: "job-old" }]);
    expect(job?.job_name).toBe(`B-${b.lineage_hash}-r1-a2`);
    expect(job?.retry_of).toBe("job-old");
    expect(exec.submitted[0]?.tags.retry_of).toBe("job-old");
    expect(exec.submitted[0]?.tags.attempt).toBe("2");
  });

  it("reports each handle as soon as it is submitted", async () => {
    const recorded: string[] = [];
    const { submitter } = setup(
      1,
      { failSubmit: (req) => req.unit_id === "B" },
      { onSubmitted: (job) => void recorded.push(job.job_handle) },
    );
    await expect(submitter.submitBatch(entries(["A", "B"]))).rejects.toMatchObject({ code: "SUBMISSION_ABORTED" });
    expect(recorded).toEqual(["job-1"]);
  });

  it("aborts the batch when a submitted job cannot be recorded", async () => {
    const { exec, submitter } = setup(
      1,
      {},
      {
        onSubmitted: (job) => {
          if (job.job_handle === "job-2") throw new Error("disk full");
        },
      },
    );
    await expect(submitter.submitBatch(entries(["A", "B", "C"]))).rejects.toMatchObject({
      code: "SUBMISSION_ABORTED",
      detail: {
        failures: [{ unit_id: "B", attempts: 1, error: "Could not record job-2: disk full" }],
        cancelled: ["job-1", "job-2"],
        skipped: ["C"],
      },
    });
    expect(exec.cancelled).toEqual(["job-1", "job-2"]);
  });

  it("wakes units waiting on a retry delay when the batch aborts", async () => {
    const clock = new ManualClock(T0, false);
    const exec = new FakeExecutionService({ failSubmit: () => true });
    let release = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const gated: ExecutionService = {
      submit: async (req) => {
        if (req.unit_id === "A") await gate;
        return exec.submit(req);
      },
      getStatus: (handle) => exec.getStatus(handle),
      cancel: (handle) => exec.cancel(handle),
    };
    const submitter = new JobSubmitter(gated, {
      admission: new AdmissionControl(2),
      retryDelaysMs: [30_000],
      clock,
      emit: recorder(clock).emit,
      runId: "r1",
    });

    const settled = submitter.submitBatch(entries(["A", "B"])).catch((e: unknown) => e);
    // B waits until T0+30s.
    await vi.waitFor(() => expect(clock.sleeping).toBe(1));
    clock.advance(10_000);
    release();
    // A fails later and waits until T0+40s.
    await vi.waitFor(() => expect(clock.sleeping).toBe(2));
    clock.advance(20_000);

    expect(await settled).toMatchObject({
      code: "SUBMISSION_ABORTED",
      detail: { failures: [{ unit_id: "B", attempts: 2 }], skipped: ["A"] },
    });
    expect(clock.sleeping).toBe(0);
    expect(clock.now()).toBe(T0 + 30_000);
    expect(exec.submitCalls.filter((n) => n.startsWith("A-"))).toHaveLength(1);
  });
});
