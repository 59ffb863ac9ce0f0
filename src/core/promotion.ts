import { artifactRef, type Artifact, type ArtifactPayload, type ArtifactTags } from "../types/artifact.js";
import type { PromotionRequest } from "../types/promotion.js";
import type { ApprovalChannel, ArtifactStore } from "../types/services.js";
import { latestVersion } from "../registry/tags.js";
import { backoffDelay, type BackoffPolicy } from "./backoff.js";
import { isoAt, type Clock } from "./clock.js";
import { errorMessage } from "./errors.js";
import type { Emitter } from "./progress.js";

export type VisibilityPolicy = BackoffPolicy & { ceilingMs: number };

export type PromotionOptions = {
  approvals: ApprovalChannel;
  shared: ArtifactStore;
  sourceEnvironment: string;
  approvalTimeoutMs: number;
  visibility: VisibilityPolicy;
  clock: Clock;
  emit: Emitter;
  /** Called after every state transition of a request. */
  onChange?: (request: PromotionRequest) => Promise<void>;
};

export function promotionRequestId(artifact: Pick<Artifact, "name" | "version">): string {
  return `promote-${artifact.name}-v${artifact.version}`;
}

/**
 * Drives each registered artifact through approval, copy into the shared
 * registry and confirmation that the copy is readable there. Requests are
 * independent: one that waits or fails never holds back the others.
 */
export class PromotionCoordinator {
  constructor(private readonly opts: PromotionOptions) {}

  promoteAll(artifacts: readonly Artifact[], previous: readonly PromotionRequest[] = []): Promise<PromotionRequest[]> {
    const byId = new Map(previous.map((p) => [p.request_id, p]));
    return Promise.all(artifacts.map((a) => this.promoteOne(a, byId.get(promotionRequestId(a)))));
  }

  /** Resolves with the request in its final state; never rejects. */
  async promoteOne(artifact: Artifact, previous?: PromotionRequest): Promise<PromotionRequest> {
    if (previous && previous.resolution !== "open") return previous;

    const ref = artifactRef(artifact);
    const request: PromotionRequest = previous
      ? { ...previous }
      : {
          request_id: promotionRequestId(artifact),
          artifact: ref,
          approval_state: "Pending",
          propagation_state: "NotStarted",
          resolution: "open",
          opened_at: isoAt(this.opts.clock),
          decided_at: null,
          confirmed_at: null,
          shared_version: null,
          error: null,
        };

    try {
      const record = await this.opts.approvals.open({
        request_id: request.request_id,
        kind: "promotion",
        subject: `${artifact.name} v${artifact.version}`,
        summary: { ...ref, environment: this.opts.sourceEnvironment },
        timeout_ms: this.opts.approvalTimeoutMs,
      });
      request.opened_at = record.opened_at;
      request.error = null;
      this.opts.emit("promote", ref.unit_id, "awaiting_approval", { request_id: request.request_id });
      await this.changed(request);

      const outcome = await this.opts.approvals.waitForDecision(request.request_id);
      if (outcome === "TimedOut") {
        request.resolution = "approval_timed_out";
        this.opts.emit("promote", ref.unit_id, "approval_timed_out", { request_id: request.request_id });
        await this.changed(request);
        return request;
      }

      request.approval_state = outcome;
      request.decided_at = isoAt(this.opts.clock);
      if (outcome === "Rejected") {
        request.resolution = "rejected";
        this.opts.emit("promote", ref.unit_id, "rejected", { request_id: request.request_id });
        await this.changed(request);
        return request;
      }

      this.opts.emit("promote", ref.unit_id, "approved", { request_id: request.request_id });
      request.propagation_state = "Copying";
      await this.changed(request);

      try {
        request.shared_version = await this.copyToShared(artifact);
      } catch (e) {
        request.propagation_state = "NotStarted";
        request.resolution = "copy_failed";
        request.error = errorMessage(e);
        this.opts.emit("promote", ref.unit_id, "copy_failed", { error: request.error });
        await this.changed(request);
        return request;
      }

      this.opts.emit("promote", ref.unit_id, "copied", { shared_version: request.shared_version });
      await this.changed(request);

      const visible = await this.awaitVisibility(artifact.name, request.shared_version, ref.unit_id);
      if (visible) {
        request.propagation_state = "Confirmed";
        request.resolution = "confirmed";
        request.confirmed_at = isoAt(this.opts.clock);
        this.opts.emit("promote", ref.unit_id, "confirmed", { shared_version: request.shared_version });
      } else {
        request.propagation_state = "TimedOut";
        request.resolution = "propagation_timed_out";
        this.opts.emit("promote", ref.unit_id, "propagation_timed_out", { shared_version: request.shared_version });
      }
      await this.changed(request);
      return request;
    } catch (e) {
      request.error = errorMessage(e);
      if (request.approval_state === "Approved" && request.propagation_state !== "Confirmed") {
        request.resolution = "copy_failed";
      }
      this.opts.emit("promote", ref.unit_id, "error", { error: request.error });
      return request;
    }
  }

  /** Copy into the shared registry, reusing a copy an earlier attempt already made. */
  private async copyToShared(artifact: Artifact): Promise<number> {
    const source = this.opts.sourceEnvironment;
    const origin: ArtifactTags = { source_environment: source, source_version: String(artifact.version) };
    const existing = latestVersion(await this.opts.shared.list(artifact.name, origin));
    if (existing) return existing.version;

    const payload: ArtifactPayload = {
      ...artifact.payload,
      promoted_from: { environment: source, name: artifact.name, version: artifact.version },
    };
    const tags: ArtifactTags = {
      ...artifact.tags,
      ...origin,
      promoted_from: `${source}/${artifact.name}/v${artifact.version}`,
    };
    return this.opts.shared.createVersion(artifact.name, payload, tags);
  }

  private async awaitVisibility(name: string, version: number, unitId: string): Promise<boolean> {
    const { clock, visibility } = this.opts;
    const start = clock.now();
    for (let attempt = 0; ; attempt++) {
      try {
        if (await this.opts.shared.get(name, version)) return true;
      } catch (e) {
        this.opts.emit("promote", unitId, "visibility_check_failed", { error: errorMessage(e) });
      }
      const elapsed = clock.now() - start;
      if (elapsed >= visibility.ceilingMs) return false;
      this.opts.emit("promote", unitId, "awaiting_visibility", { attempt: attempt + 1 });
      await clock.sleep(Math.min(backoffDelay(visibility, attempt), visibility.ceilingMs - elapsed));
    }
  }

  private async changed(request: PromotionRequest): Promise<void> {
    if (this.opts.onChange) await this.opts.onChange({ ...request });
  }
}
