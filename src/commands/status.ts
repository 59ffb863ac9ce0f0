import fs from "node:fs";
import path from "node:path";
import { errorMessage } from "../core/errors.js";
import { loadRunState, statePathForRun, summarize } from "../core/orchestrator.js";
import type { RunState, RunSummary } from "../types/run.js";
import { loadContext, type CommandError, type CommandOptions } from "./context.js";

export type StatusResult =
  | { ok: true; state: RunState; summary: RunSummary }
  | { ok: false; error: CommandError };

export type RunListing = { run_id: string; mode: string; step: string; updated_at: string };

/**
 * Read checkpointed state for a run.
 */
export async function status(opts: CommandOptions & { runId: string }): Promise<StatusResult> {
  const ctx = await loadContext(opts);
  if (!ctx.ok) return ctx;

  try {
    const state = await loadRunState(statePathForRun(ctx.context.paths.stateDir, opts.runId));
    if (!state) return { ok: false, error: { code: "RUN_NOT_FOUND", message: `No run found: ${opts.runId}` } };

    const failed = state.steps.find((s) => s.status === "error");
    const fatal = failed?.error
      ? { stage: failed.id, unit_id: null, code: failed.error.code, message: failed.error.message }
      : null;
    return { ok: true, state, summary: summarize(state, fatal) };
  } catch (e) {
    return { ok: false, error: { code: "STATE_CORRUPT", message: errorMessage(e) } };
  }
}

/** The step a run is on: the first one not finished, or "done". */
export function currentStep(state: RunState): string {
  const open = state.steps.find((s) => s.status !== "ok" && s.status !== "skipped");
  return open ? `${open.id}:${open.status}` : "done";
}

/**
 * List all runs, most recently updated first.
 */
export async function listRuns(opts: CommandOptions): Promise<{ ok: true; runs: RunListing[] } | { ok: false; error: CommandError }> {
  const ctx = await loadContext(opts);
  if (!ctx.ok) return ctx;

  const runsDir = path.join(ctx.context.paths.stateDir, "runs");
  if (!fs.existsSync(runsDir)) return { ok: true, runs: [] };

  const runs: RunListing[] = [];
  for (const entry of fs.readdirSync(runsDir, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue;
    try {
      const state = await loadRunState(statePathForRun(ctx.context.paths.stateDir, entry.name));
      if (!state) continue;
      runs.push({ run_id: state.run_id, mode: state.mode, step: currentStep(state), updated_at: state.updated_at });
    } catch (e) {
      console.warn(`[trainctl] Skipping run ${entry.name}: ${errorMessage(e)}`);
      runs.push({ run_id: entry.name, mode: "unknown", step: "corrupted", updated_at: "" });
    }
  }

  return { ok: true, runs: runs.sort((a, b) => b.updated_at.localeCompare(a.updated_at)) };
}
