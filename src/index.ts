export * from "./types/config.js";
export * from "./types/unit.js";
export * from "./types/artifact.js";
export * from "./types/promotion.js";
export * from "./types/approval.js";
export * from "./types/services.js";
export * from "./types/run.js";

export { PipelineError, isPipelineError, type PipelineErrorCode } from "./core/errors.js";
export { systemClock, type Clock } from "./core/clock.js";
export { createEmitter, formatEvent, streamSink, type OutputFormat } from "./core/progress.js";
export { AdmissionControl } from "./core/concurrency.js";
export { selectUnits, matchManualIds } from "./core/selector.js";
export { JobSubmitter, jobNameFor } from "./core/submitter.js";
export { JobMonitor } from "./core/monitor.js";
export { RetryCoordinator } from "./core/retry.js";
export { ModelRegistrar } from "./core/registrar.js";
export { PromotionCoordinator, promotionRequestId } from "./core/promotion.js";
export { resolveArtifact, resolveAll, type Resolution } from "./core/resolver.js";
export { Orchestrator, type PipelineServices, type RunRequest, type RunResult } from "./core/orchestrator.js";

export { canonicalJson, lineageHash, LINEAGE_HASH_LENGTH } from "./lineage/canonical.js";
export { materializeUnits, materializeUnit, type MasterList } from "./lineage/materializer.js";
export { loadMasterList, writeUnitFiles } from "./lineage/units-file.js";

export { loadConfig } from "./config/loader.js";
export { validateConfig } from "./config/validator.js";

export { FileArtifactStore } from "./registry/file-store.js";
export { FileApprovalChannel } from "./approvals/file-channel.js";
export { CommandExecutionService } from "./execution/command-service.js";
export { GitOperations } from "./git/operations.js";
