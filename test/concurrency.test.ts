import { describe, expect, it } from "vitest";
import { AdmissionControl } from "../src/core/concurrency.js";
import { flush } from "./support/fakes.js";

describe("AdmissionControl", () => {
  it("rejects a capacity that is not a positive integer", () => {
    expect(() => new AdmissionControl(0)).toThrow("Admission capacity must be a positive integer, got 0");
    expect(() => new AdmissionControl(1.5)).toThrow("got 1.5");
  });

  it("never runs more than `capacity` tasks at once", async () => {
    const admission = new AdmissionControl(3);
    let running = 0;
    let peak = 0;
    const task = async () => {
      running++;
      peak = Math.max(peak, running);
      await flush();
      running--;
    };
    await Promise.all(Array.from({ length: 10 }, () => admission.run(task)));
    expect(peak).toBe(3);
    expect(admission.active).toBe(0);
    expect(admission.queued).toBe(0);
  });

  it("hands a released slot to the next waiter", async () => {
    const admission = new AdmissionControl(1);
    const release = await admission.acquire();
    let second = false;
    const waiting = admission.acquire().then((r) => {
      second = true;
      return r;
    });
    await flush();
    expect(second).toBe(false);
    expect(admission.queued).toBe(1);

    release();
    release(); // idempotent
    const releaseSecond = await waiting;
    expect(second).toBe(true);
    expect(admission.active).toBe(1);
    releaseSecond();
    expect(admission.active).toBe(0);
  });

  it("releases the slot when a task throws", async () => {
    const admission = new AdmissionControl(1);
    await expect(admission.run(async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(admission.active).toBe(0);
  });
});
