import { systemClock } from "../core/clock.js";
import { resolveAll, type Resolution } from "../core/resolver.js";
import { FileArtifactStore } from "../registry/file-store.js";
import type { ArtifactStore } from "../types/services.js";
import type { CommandError, CommandOptions } from "./context.js";
import { loadUnits } from "./units.js";

export type ResolveCommandResult =
  | { ok: true; store: string; resolutions: Resolution[] }
  | { ok: false; error: CommandError };

/**
 * For each unit, the artifact version matching its current configuration.
 * Reads the training workspace unless `shared` is set.
 */
export async function resolveCommand(
  opts: CommandOptions & { unitIds?: string[]; shared?: boolean; store?: ArtifactStore },
): Promise<ResolveCommandResult> {
  const res = await loadUnits(opts);
  if (!res.ok) return res;

  const { config, paths } = res.context;
  const store =
    opts.store ??
    (opts.shared
      ? new FileArtifactStore("shared", paths.sharedStore, systemClock)
      : new FileArtifactStore(config.environment, paths.trainingStore, systemClock));

  return { ok: true, store: store.environment, resolutions: await resolveAll(res.units, store) };
}
