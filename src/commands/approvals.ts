import { FileApprovalChannel, type ApprovalListing } from "../approvals/file-channel.js";
import { errorMessage } from "../core/errors.js";
import type { ApprovalDecision, ApprovalRecord } from "../types/approval.js";
import { loadContext, type CommandError, type CommandOptions } from "./context.js";

export type ApprovalsListResult =
  | { ok: true; records: ApprovalRecord[]; invalid: ApprovalListing["invalid"] }
  | { ok: false; error: CommandError };

export type DecideResult = { ok: true; record: ApprovalRecord } | { ok: false; error: CommandError };

export async function listApprovals(
  opts: CommandOptions & { pendingOnly?: boolean; now?: () => number },
): Promise<ApprovalsListResult> {
  const ctx = await loadContext(opts);
  if (!ctx.ok) return ctx;

  try {
    const channel = new FileApprovalChannel({ dir: ctx.context.paths.approvalsDir });
    const { records, invalid } = await channel.list();
    for (const bad of invalid) console.warn(`[trainctl] Skipping approval record ${bad.file}: ${bad.error}`);
    if (!opts.pendingOnly) return { ok: true, records, invalid };
    const now = (opts.now ?? Date.now)();
    return { ok: true, records: records.filter((r) => r.decision === null && Date.parse(r.deadline_at) > now), invalid };
  } catch (e) {
    return { ok: false, error: { code: "APPROVALS_UNREADABLE", message: errorMessage(e) } };
  }
}

/** Record an operator decision. A running pipeline waiting on the request picks it up. */
export async function decideApproval(
  opts: CommandOptions & { requestId: string; decision: ApprovalDecision; by: string },
): Promise<DecideResult> {
  const ctx = await loadContext(opts);
  if (!ctx.ok) return ctx;

  try {
    const channel = new FileApprovalChannel({ dir: ctx.context.paths.approvalsDir });
    return { ok: true, record: await channel.decide(opts.requestId, opts.decision, opts.by) };
  } catch (e) {
    return { ok: false, error: { code: "DECISION_REFUSED", message: errorMessage(e) } };
  }
}
