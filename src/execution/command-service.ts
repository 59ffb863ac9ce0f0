import { execFile } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import { promisify } from "node:util";
import type { ExecutionConfig } from "../types/config.js";
import type { ExecutionService, SubmitRequest } from "../types/services.js";
import type { JobStatus } from "../types/unit.js";
import { recordFile } from "../state/paths.js";

const pExecFile = promisify(execFile);

export type ExecFn = (file: string, args: string[]) => Promise<{ stdout: string; stderr: string }>;

const defaultExec: ExecFn = async (file, args) => {
  const { stdout, stderr } = await pExecFile(file, args, { maxBuffer: 10 * 1024 * 1024 });
  return { stdout: String(stdout), stderr: String(stderr) };
};

const STATUS_WORDS: Record<string, JobStatus> = {
  notstarted: "Queued",
  queued: "Queued",
  starting: "Running",
  preparing: "Running",
  provisioning: "Running",
  running: "Running",
  finalizing: "Running",
  cancelrequested: "Running",
  completed: "Completed",
  finished: "Completed",
  failed: "Failed",
  canceled: "Canceled",
  cancelled: "Canceled",
};

/** Map a vendor status word onto the job lifecycle. */
export function normalizeJobStatus(raw: string): JobStatus {
  const key = raw.trim().toLowerCase().replace(/[\s_-]/g, "");
  const status = STATUS_WORDS[key];
  if (!status) {
    throw new Error(`Unrecognized job status: '${raw.trim()}'`);
  }
  return status;
}

/** Substitute `{name}` placeholders; unknown placeholders are an error. */
export function expandTemplate(template: readonly string[], values: Record<string, string>): string[] {
  return template.map((arg) =>
    arg.replace(/\{([a-z_]+)\}/g, (_m, name: string) => {
      const value = values[name];
      if (value === undefined) throw new Error(`Unknown placeholder {${name}} in '${arg}'`);
      return value;
    }),
  );
}

/**
 * Execution service backed by a vendor CLI: each operation is an argv
 * template from config. Parameters travel in a JSON file written under
 * `paramsDir`; the submit command prints the job handle on stdout.
 */
export class CommandExecutionService implements ExecutionService {
  private readonly paramsDir: string;

  constructor(
    private readonly commands: ExecutionConfig,
    paramsDir: string,
    private readonly exec: ExecFn = defaultExec,
  ) {
    this.paramsDir = path.resolve(paramsDir);
  }

  async submit(request: SubmitRequest): Promise<string> {
    fs.mkdirSync(this.paramsDir, { recursive: true });
    const paramsFile = recordFile(this.paramsDir, request.job_name);
    fs.writeFileSync(paramsFile, JSON.stringify({ parameters: request.parameters, tags: request.tags }, null, 2) + "\n", "utf8");

    const { stdout } = await this.invoke(this.commands.submit, {
      job_name: request.job_name,
      unit_id: request.unit_id,
      lineage_hash: request.tags.lineage_hash ?? "",
      params_file: paramsFile,
    });
    const handle = stdout.trim();
    if (handle.length === 0) {
      throw new Error(`Submit command printed no job handle for ${request.job_name}`);
    }
    return handle;
  }

  async getStatus(handle: string): Promise<JobStatus> {
    const { stdout } = await this.invoke(this.commands.status, { handle });
    return normalizeJobStatus(stdout);
  }

  async cancel(handle: string): Promise<void> {
    await this.invoke(this.commands.cancel, { handle });
  }

  private async invoke(template: readonly string[], values: Record<string, string>) {
    const [file, ...args] = expandTemplate(template, values);
    if (!file) throw new Error("Empty command template");
    return this.exec(file, args);
  }
}
