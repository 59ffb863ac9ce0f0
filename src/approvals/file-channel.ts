import { EventEmitter } from "node:events";
import fs from "node:fs";
import path from "node:path";
import { systemClock, type Clock } from "../core/clock.js";
import { errorMessage } from "../core/errors.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import { atomicWriteJson, readJsonFile, withFileLock } from "../state/durable.js";
import { recordFile } from "../state/paths.js";
import type { ApprovalDecision, ApprovalOutcome, ApprovalRecord, ApprovalRequest } from "../types/approval.js";
import type { ApprovalChannel } from "../types/services.js";

export type FileApprovalChannelOptions = {
  dir: string;
  clock?: Clock;
  /** Watch the directory so decisions written by another process wake waiters. */
  watch?: boolean;
  /** Upper bound on one uninterrupted wait before the record is re-read. */
  maxWakeMs?: number;
  registry?: SchemaRegistry;
};

export type ApprovalListing = {
  records: ApprovalRecord[];
  invalid: Array<{ file: string; error: string }>;
};

const HOUR_MS = 3_600_000;

/**
 * Durable approval channel: one JSON record per request. The deadline is
 * fixed when the request is first opened, so a restarted process resumes
 * the same approval window instead of starting a new one.
 */
export class FileApprovalChannel implements ApprovalChannel {
  private readonly dir: string;
  private readonly clock: Clock;
  private readonly watch: boolean;
  private readonly maxWakeMs: number;
  private readonly decided = new EventEmitter();
  private registry: SchemaRegistry | null;

  constructor(opts: FileApprovalChannelOptions) {
    this.dir = path.resolve(opts.dir);
    this.clock = opts.clock ?? systemClock;
    this.watch = opts.watch ?? false;
    this.maxWakeMs = opts.maxWakeMs ?? HOUR_MS;
    this.registry = opts.registry ?? null;
    this.decided.setMaxListeners(0);
  }

  recordPath(requestId: string): string {
    return recordFile(this.dir, requestId);
  }

  async read(requestId: string): Promise<ApprovalRecord | null> {
    const filePath = this.recordPath(requestId);
    const data = await readJsonFile(filePath);
    if (data === null) return null;

    const registry = this.registry ?? (this.registry = await createRegistry());
    const res = await registry.check<ApprovalRecord>("approval", data);
    if (!res.valid) {
      throw new Error(`Invalid approval record ${filePath}: ${res.errors}`);
    }
    return res.value;
  }

  /** Every readable record, oldest first; files that fail to parse or validate are reported in `invalid`. */
  async list(): Promise<ApprovalListing> {
    const listing: ApprovalListing = { records: [], invalid: [] };
    if (!fs.existsSync(this.dir)) return listing;
    const files = fs.readdirSync(this.dir).filter((f) => f.endsWith(".json"));

    for (const file of files) {
      try {
        const rec = await this.read(file.slice(0, -".json".length));
        if (rec) listing.records.push(rec);
      } catch (e) {
        listing.invalid.push({ file: path.join(this.dir, file), error: errorMessage(e) });
      }
    }
    listing.records.sort((a, b) => a.opened_at.localeCompare(b.opened_at) || a.request_id.localeCompare(b.request_id));
    return listing;
  }

  async open(request: ApprovalRequest): Promise<ApprovalRecord> {
    const filePath = this.recordPath(request.request_id);
    return withFileLock(filePath, async () => {
      const existing = await this.read(request.request_id);
      if (existing) return existing;

      const now = this.clock.now();
      const record: ApprovalRecord = {
        schema_version: 1,
        request_id: request.request_id,
        kind: request.kind,
        subject: request.subject,
        summary: request.summary,
        opened_at: new Date(now).toISOString(),
        deadline_at: new Date(now + request.timeout_ms).toISOString(),
        decision: null,
        decided_at: null,
        decided_by: null,
      };
      await atomicWriteJson(filePath, record);
      return record;
    });
  }

  async decide(requestId: string, decision: ApprovalDecision, decidedBy: string): Promise<ApprovalRecord> {
    const filePath = this.recordPath(requestId);
    const record = await withFileLock(filePath, async () => {
      const rec = await this.read(requestId);
      if (!rec) throw new Error(`No approval request: ${requestId}`);

      if (rec.decision !== null) {
        if (rec.decision === decision) return rec;
        throw new Error(`Approval request ${requestId} was already ${rec.decision.toLowerCase()}`);
      }
      if (Date.parse(rec.deadline_at) <= this.clock.now()) {
        throw new Error(`Approval request ${requestId} expired at ${rec.deadline_at}`);
      }

      const next: ApprovalRecord = {
        ...rec,
        decision,
        decided_at: new Date(this.clock.now()).toISOString(),
        decided_by: decidedBy,
      };
      await atomicWriteJson(filePath, next);
      return next;
    });

    this.decided.emit(requestId, record.decision);
    return record;
  }

  async waitForDecision(requestId: string): Promise<ApprovalOutcome> {
    for (;;) {
      const controller = new AbortController();
      const wake = () => controller.abort();
      this.decided.once(requestId, wake);
      const watcher = this.watchRecord(requestId, wake);

      try {
        // Subscribed before reading, so a decision landing in between still wakes us.
        const rec = await this.read(requestId);
        if (!rec) throw new Error(`No approval request: ${requestId}`);
        if (rec.decision !== null) return rec.decision;

        const remaining = Date.parse(rec.deadline_at) - this.clock.now();
        if (remaining <= 0) return "TimedOut";

        await this.clock.sleep(Math.min(remaining, this.maxWakeMs), controller.signal);
      } finally {
        this.decided.off(requestId, wake);
        watcher?.close();
      }
    }
  }

  private watchRecord(requestId: string, wake: () => void): fs.FSWatcher | null {
    if (!this.watch) return null;
    fs.mkdirSync(this.dir, { recursive: true });
    const target = `${requestId}.json`;
    const watcher = fs.watch(this.dir, { persistent: false }, (_event, filename) => {
      if (filename === null || filename === target) wake();
    });
    watcher.on("error", wake);
    return watcher;
  }
}
