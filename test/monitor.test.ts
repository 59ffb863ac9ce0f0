import { describe, expect, it } from "vitest";
import { JobMonitor, partitionJobs } from "../src/core/monitor.js";
import type { JobStatus, TrainingJob } from "../src/types/unit.js";
import { FakeExecutionService, ManualClock, recorder, type FakeExecutionOptions } from "./support/fakes.js";

async function launch(plans: Record<string, JobStatus[]>, opts: Omit<FakeExecutionOptions, "plan"> = {}) {
  const exec = new FakeExecutionService({ ...opts, plan: (req) => plans[req.unit_id] ?? ["Completed"] });
  const jobs: TrainingJob[] = [];
  for (const unitId of Object.keys(plans)) {
    const handle = await exec.submit({ job_name: `${unitId}-job`, unit_id: unitId, parameters: {}, tags: {} });
    jobs.push({
      unit_id: unitId,
      job_name: `${unitId}-job`,
      job_handle: handle,
      status: "Queued",
      lineage_hash: "abcdef123456",
      attempt: 1,
      retry_of: null,
      submitted_at: "2026-01-01T00:00:00.000Z",
      finished_at: null,
      timed_out: false,
    });
  }
  return { exec, jobs };
}

function monitorFor(exec: FakeExecutionService, overrides: { maxWaitMs?: number; heartbeatMs?: number } = {}) {
  const clock = new ManualClock();
  const rec = recorder(clock);
  const monitor = new JobMonitor(exec, {
    initialIntervalMs: 30_000,
    maxIntervalMs: 300_000,
    maxWaitMs: overrides.maxWaitMs ?? 10_800_000,
    heartbeatMs: overrides.heartbeatMs ?? 14_400_000,
    clock,
    emit: rec.emit,
  });
  return { clock, rec, monitor };
}

describe("JobMonitor", () => {
  it("backs off exponentially between polling cycles", async () => {
    const { exec, jobs } = await launch({ A: ["Running", "Running", "Running", "Completed"] });
    const { clock, monitor } = monitorFor(exec);
    const res = await monitor.watch(jobs);
    expect(clock.sleeps).toEqual([30_000, 60_000, 120_000]);
    expect(res.completed.map((j) => j.unit_id)).toEqual(["A"]);
    expect(res.completed[0]?.finished_at).toBe(new Date(clock.now()).toISOString());
  });

  it("caps the interval and stops at the wait ceiling", async () => {
    const { exec, jobs } = await launch({ A: ["Running"] });
    const { clock, rec, monitor } = monitorFor(exec, { maxWaitMs: 600_000 });
    const res = await monitor.watch(jobs);

    expect(clock.sleeps).toEqual([30_000, 60_000, 120_000, 240_000, 150_000]);
    expect(res.completed).toEqual([]);
    expect(res.timed_out).toHaveLength(1);
    expect(res.timed_out[0]).toMatchObject({ unit_id: "A", status: "Running", timed_out: true });
    expect(rec.states("monitor")).toContain("A:timed_out");
  });

  it("never waits longer than the maximum interval", async () => {
    const { exec, jobs } = await launch({ A: ["Running"] });
    const { clock, monitor } = monitorFor(exec, { maxWaitMs: 2_000_000 });
    await monitor.watch(jobs);
    expect(Math.max(...clock.sleeps)).toBe(300_000);
  });

  it("does not poll a job again once it is terminal", async () => {
    const { exec, jobs } = await launch({ A: ["Failed"], B: ["Running", "Completed"] });
    const { monitor } = monitorFor(exec);
    const res = await monitor.watch(jobs);
    expect(exec.statusCalls).toEqual(["job-1", "job-2", "job-2"]);
    expect(res.failed.map((j) => j.unit_id)).toEqual(["A"]);
    expect(res.completed.map((j) => j.unit_id)).toEqual(["B"]);
  });

  it("treats canceled jobs as failed", async () => {
    const { exec, jobs } = await launch({ A: ["Canceled"] });
    const res = await monitorFor(exec).monitor.watch(jobs);
    expect(res.failed.map((j) => j.status)).toEqual(["Canceled"]);
  });

  it("keeps polling after a status call fails", async () => {
    const { exec, jobs } = await launch({ A: ["Completed"] }, { failStatus: (_h, call) => call === 1 });
    const { rec, monitor } = monitorFor(exec);
    const res = await monitor.watch(jobs);
    expect(res.completed).toHaveLength(1);
    expect(rec.states("monitor")).toEqual(["-:started", "A:status_error", "A:completed", "-:finished"]);
  });

  it("emits a still-running notice on the heartbeat cadence", async () => {
    const { exec, jobs } = await launch({ A: ["Running", "Running", "Running", "Completed"] });
    const { rec, monitor } = monitorFor(exec, { heartbeatMs: 60_000 });
    await monitor.watch(jobs);
    expect(rec.states("monitor").filter((s) => s === "-:still_running")).toHaveLength(1);
  });

  it("does not mutate the jobs it is given", async () => {
    const { exec, jobs } = await launch({ A: ["Completed"] });
    await monitorFor(exec).monitor.watch(jobs);
    expect(jobs[0]?.status).toBe("Queued");
  });
});

describe("partitionJobs", () => {
  it("splits jobs by outcome", () => {
    const base = {
      job_name: "n",
      lineage_hash: "h",
      attempt: 1,
      retry_of: null,
      submitted_at: "t",
      finished_at: null,
    };
    const res = partitionJobs([
      { ...base, unit_id: "A", job_handle: "1", status: "Completed", timed_out: false },
      { ...base, unit_id: "B", job_handle: "2", status: "Failed", timed_out: false },
      { ...base, unit_id: "C", job_handle: "3", status: "Running", timed_out: true },
      { ...base, unit_id: "D", job_handle: "4", status: "Canceled", timed_out: false },
    ]);
    expect(res.completed.map((j) => j.unit_id)).toEqual(["A"]);
    expect(res.failed.map((j) => j.unit_id)).toEqual(["B", "D"]);
    expect(res.timed_out.map((j) => j.unit_id)).toEqual(["C"]);
  });
});
