import { FileApprovalChannel } from "../approvals/file-channel.js";
import { systemClock } from "../core/clock.js";
import { errorMessage, isPipelineError } from "../core/errors.js";
import { Orchestrator, type PipelineServices } from "../core/orchestrator.js";
import { CommandExecutionService } from "../execution/command-service.js";
import { GitOperations } from "../git/operations.js";
import type { MasterList } from "../lineage/materializer.js";
import { loadMasterList } from "../lineage/units-file.js";
import { FileArtifactStore } from "../registry/file-store.js";
import type { ProgressSink, RunMode, RunSummary } from "../types/run.js";
import { loadContext, type CommandContext, type CommandError, type CommandOptions } from "./context.js";

export type RunCommandOptions = CommandOptions & {
  mode: RunMode;
  unitIds?: string[];
  runId?: string;
  sink?: ProgressSink;
  /** Replace individual adapters (tests, embedding). */
  services?: Partial<PipelineServices>;
};

export type RunCommandResult =
  | { ok: true; summary: RunSummary; statePath: string }
  | { ok: false; error: CommandError; summary?: RunSummary; statePath?: string | null };

export function defaultServices(context: CommandContext): PipelineServices {
  const { config, paths } = context;
  const clock = systemClock;
  return {
    execution: new CommandExecutionService(config.execution, paths.paramsDir),
    training: new FileArtifactStore(config.environment, paths.trainingStore, clock),
    shared: new FileArtifactStore("shared", paths.sharedStore, clock),
    approvals: new FileApprovalChannel({ dir: paths.approvalsDir, clock, watch: true }),
    source: new GitOperations(context.cwd),
    clock,
  };
}

/** Load config and the master list, then run (or resume) the pipeline. */
export async function runCommand(opts: RunCommandOptions): Promise<RunCommandResult> {
  if (opts.mode === "manual" && !opts.runId && (opts.unitIds ?? []).length === 0) {
    return { ok: false, error: { code: "INVALID_ARGS", message: "Manual mode needs at least one --unit" } };
  }

  const ctx = await loadContext(opts);
  if (!ctx.ok) return ctx;

  let master: MasterList;
  try {
    master = await loadMasterList(ctx.context.paths.unitsFile);
  } catch (e) {
    return {
      ok: false,
      error: { code: isPipelineError(e) ? e.code : "UNITS_INVALID", message: errorMessage(e) },
    };
  }

  const services: PipelineServices = { ...defaultServices(ctx.context), ...opts.services };
  if (opts.sink) services.sink = opts.sink;

  // The orchestrator resolves state_dir against the process; pin it to the command's cwd.
  const config = { ...ctx.context.config, state_dir: ctx.context.paths.stateDir };
  const orchestrator = new Orchestrator(config, services);
  const res = await orchestrator.run({
    mode: opts.mode,
    master,
    manualUnitIds: opts.unitIds,
    runId: opts.runId,
  });
  if (res.ok) return res;
  return { ok: false, error: res.error, summary: res.summary, statePath: res.statePath };
}
