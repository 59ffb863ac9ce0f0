#!/usr/bin/env node

import { Command } from "commander";
import { decideApproval, listApprovals } from "./commands/approvals.js";
import type { CommandError } from "./commands/context.js";
import { EXIT, exitCodeForError } from "./commands/exit-codes.js";
import { resolveCommand } from "./commands/resolve.js";
import { runCommand } from "./commands/run.js";
import { currentStep, listRuns, status } from "./commands/status.js";
import { unitsCommand } from "./commands/units.js";
import { validateAll } from "./commands/validate.js";
import { streamSink, type OutputFormat } from "./core/progress.js";
import type { RunSummary } from "./types/run.js";

type CommonOpts = { config: string; env?: string; format: string };

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function outputFormat(raw: string): OutputFormat {
  if (raw === "human" || raw === "jsonl") return raw;
  console.error(`Unknown --format '${raw}' (expected human|jsonl)`);
  process.exit(EXIT.INVALID_ARGS);
}

function fail(format: OutputFormat, error: CommandError, exitCode: number = exitCodeForError(error.code)): never {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "error", ...error }) + "\n");
  } else {
    console.error(`${error.code}: ${error.message}`);
  }
  process.exit(exitCode);
}

function printSummary(summary: RunSummary, format: OutputFormat): void {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "info", code: "RUN_SUMMARY", summary }) + "\n");
    return;
  }
  console.log(`Run ${summary.run_id} (${summary.mode}): ${summary.outcome}`);
  console.log(
    `  submitted=${summary.submitted} completed=${summary.completed} retried=${summary.retried} failed=${summary.failed} timed_out=${summary.timed_out}`,
  );
  console.log(
    `  registered=${summary.registered} promoted=${summary.promoted} rejected=${summary.rejected} pending=${summary.pending}`,
  );
  for (const err of summary.errors) {
    console.log(`  ! [${err.stage}] ${err.unit_id ?? "-"} ${err.code}: ${err.message}`);
  }
}

const program = new Command();

program
  .name("trainctl")
  .description("Training orchestration and lineage-promotion coordinator")
  .version("0.1.0");

const withCommon = (cmd: Command): Command =>
  cmd
    .option("--config <path>", "Path to config directory", "config")
    .option("--env <name>", "Environment overlay (config/<name>.yaml)")
    .option("--format <format>", "Output format: human|jsonl", "human");

withCommon(
  program
    .command("run")
    .description("Select changed units, train, register and promote them (checkpointed)")
    .option("--manual", "Train exactly the units named with --unit")
    .option("--unit <id>", "Unit id or glob pattern (repeatable)", collect, [])
    .option("--run <id>", "Resume an existing run id"),
).action(async (opts: CommonOpts & { manual?: boolean; unit: string[]; run?: string }) => {
  const format = outputFormat(opts.format);
  const res = await runCommand({
    configDir: opts.config,
    env: opts.env,
    mode: opts.manual ? "manual" : "auto",
    unitIds: opts.unit,
    runId: opts.run,
    sink: streamSink(process.stdout, format),
  });

  if (!res.ok) {
    if (res.summary) printSummary(res.summary, format);
    fail(format, res.error);
  }
  printSummary(res.summary, format);
  if (format === "human") console.log(`  state: ${res.statePath}`);
  process.exit(res.summary.outcome === "completed_with_errors" ? EXIT.COMPLETED_WITH_ERRORS : EXIT.SUCCESS);
});

withCommon(
  program
    .command("units")
    .description("Materialize the master list and print each unit's lineage hash")
    .option("--unit <id>", "Unit id or glob pattern (repeatable)", collect, [])
    .option("--write <dir>", "Write one materialized YAML file per unit"),
).action(async (opts: CommonOpts & { unit: string[]; write?: string }) => {
  const format = outputFormat(opts.format);
  const res = await unitsCommand({ configDir: opts.config, env: opts.env, unitIds: opts.unit, writeDir: opts.write });
  if (!res.ok) fail(format, res.error);

  for (const unit of res.units) {
    if (format === "jsonl") {
      process.stdout.write(
        JSON.stringify({ unit_id: unit.unit_id, artifact_name: unit.artifact_name, lineage_hash: unit.lineage_hash }) + "\n",
      );
    } else {
      console.log(`${unit.unit_id}  ${unit.artifact_name}  ${unit.lineage_hash}`);
    }
  }
  if (format === "human" && res.written.length > 0) console.log(`Wrote ${res.written.length} unit file(s).`);
});

withCommon(
  program
    .command("resolve")
    .description("Find the artifact version trained from each unit's current configuration")
    .option("--unit <id>", "Unit id or glob pattern (repeatable)", collect, [])
    .option("--shared", "Resolve against the shared registry"),
).action(async (opts: CommonOpts & { unit: string[]; shared?: boolean }) => {
  const format = outputFormat(opts.format);
  const res = await resolveCommand({ configDir: opts.config, env: opts.env, unitIds: opts.unit, shared: opts.shared });
  if (!res.ok) fail(format, res.error);

  for (const r of res.resolutions) {
    if (format === "jsonl") {
      process.stdout.write(JSON.stringify({ store: res.store, ...r }) + "\n");
    } else {
      const found = r.artifact ? `${r.artifact.name} v${r.artifact.version}` : "(not trained)";
      console.log(`${r.unit_id}  ${r.lineage_hash}  ${found}`);
    }
  }
});

withCommon(
  program
    .command("status")
    .description("Show a run's checkpointed state (omit the id to list runs)")
    .argument("[run_id]", "Run id"),
).action(async (runId: string | undefined, opts: CommonOpts) => {
  const format = outputFormat(opts.format);
  if (!runId) {
    const res = await listRuns({ configDir: opts.config, env: opts.env });
    if (!res.ok) fail(format, res.error);
    if (format === "jsonl") {
      for (const item of res.runs) process.stdout.write(JSON.stringify(item) + "\n");
    } else if (res.runs.length === 0) {
      console.log("No runs found.");
    } else {
      for (const item of res.runs) console.log(`${item.run_id}  ${item.mode}  ${item.step}  ${item.updated_at}`);
    }
    return;
  }

  const res = await status({ configDir: opts.config, env: opts.env, runId });
  if (!res.ok) fail(format, res.error);
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify(res.state) + "\n");
  } else {
    for (const step of res.state.steps) console.log(`${step.id.padEnd(9)} ${step.status}`);
    console.log(`current: ${currentStep(res.state)}`);
    printSummary(res.summary, format);
  }
});

const approvals = program.command("approvals").description("Approval requests");

withCommon(
  approvals
    .command("list")
    .description("List approval requests")
    .option("--pending", "Only requests still awaiting a decision"),
).action(async (opts: CommonOpts & { pending?: boolean }) => {
  const format = outputFormat(opts.format);
  const res = await listApprovals({ configDir: opts.config, env: opts.env, pendingOnly: opts.pending });
  if (!res.ok) fail(format, res.error);
  for (const rec of res.records) {
    if (format === "jsonl") {
      process.stdout.write(JSON.stringify(rec) + "\n");
    } else {
      const state = rec.decision ?? `pending until ${rec.deadline_at}`;
      console.log(`${rec.request_id}  ${rec.kind}  ${state}  ${rec.subject}`);
    }
  }
});

for (const [name, decision, description] of [
  ["approve", "Approved", "Approve a pending approval request"],
  ["reject", "Rejected", "Reject a pending approval request"],
] as const) {
  withCommon(
    program
      .command(name)
      .description(description)
      .argument("<request_id>", "Approval request id")
      .option("--by <actor>", "Who decided", process.env.USER ?? "operator"),
  ).action(async (requestId: string, opts: CommonOpts & { by: string }) => {
    const format = outputFormat(opts.format);
    const res = await decideApproval({ configDir: opts.config, env: opts.env, requestId, decision, by: opts.by });
    if (!res.ok) fail(format, res.error, EXIT.INVALID_ARGS);
    if (format === "jsonl") {
      process.stdout.write(JSON.stringify(res.record) + "\n");
    } else {
      console.log(`${res.record.request_id}: ${decision.toLowerCase()} by ${res.record.decided_by ?? opts.by}`);
    }
  });
}

withCommon(
  program.command("validate").description("Validate config, execution templates, units file and approval records"),
).action(async (opts: CommonOpts) => {
  const format = outputFormat(opts.format);
  const res = await validateAll({ configDir: opts.config, env: opts.env });

  if (!res.ok) {
    if (format === "jsonl") {
      for (const err of res.errors) process.stdout.write(JSON.stringify(err) + "\n");
    } else {
      for (const err of res.errors) console.error(err.message);
    }
    process.exit(EXIT.INVALID_ARGS);
  }

  if (format === "jsonl") {
    for (const d of res.diagnostics) process.stdout.write(JSON.stringify(d) + "\n");
    process.stdout.write(JSON.stringify({ level: "info", code: "OK", message: "OK" }) + "\n");
  } else {
    for (const d of res.diagnostics) console.log(d.message);
    console.log("OK");
  }
});

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.RUN_FAILED);
});
