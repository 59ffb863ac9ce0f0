import fs from "node:fs/promises";
import path from "node:path";
import { isRecord } from "../config/merge.js";
import { systemClock, type Clock } from "../core/clock.js";
import { atomicWriteJson, isErrnoException, readJsonFile, withFileLock } from "../state/durable.js";
import { safePath } from "../state/paths.js";
import type { Artifact, ArtifactPayload, ArtifactTags } from "../types/artifact.js";
import type { ArtifactStore } from "../types/services.js";
import { matchesTags } from "./tags.js";

const VERSION_FILE = /^v(\d+)\.json$/;

function isArtifact(v: unknown): v is Artifact {
  if (!isRecord(v)) return false;
  return (
    typeof v.name === "string" &&
    typeof v.version === "number" &&
    typeof v.created_at === "string" &&
    isRecord(v.tags) &&
    isRecord(v.payload)
  );
}

/**
 * Artifact store on the local filesystem: `<root>/<name>/v<N>.json`.
 * Version allocation holds a per-name lock so versions stay monotonic
 * when several processes register into the same store.
 */
export class FileArtifactStore implements ArtifactStore {
  private readonly root: string;

  constructor(
    readonly environment: string,
    root: string,
    private readonly clock: Clock = systemClock,
  ) {
    this.root = path.resolve(root);
  }

  async createVersion(name: string, payload: ArtifactPayload, tags: ArtifactTags): Promise<number> {
    const dir = safePath(this.root, name);
    await fs.mkdir(dir, { recursive: true });

    return withFileLock(path.join(dir, "versions"), async () => {
      const existing = await this.versionNumbers(dir);
      const version = existing.length === 0 ? 1 : Math.max(...existing) + 1;
      const artifact: Artifact = {
        name,
        version,
        tags: { ...tags },
        payload,
        created_at: new Date(this.clock.now()).toISOString(),
      };
      await atomicWriteJson(path.join(dir, `v${version}.json`), artifact);
      return version;
    });
  }

  async list(name: string, tagFilter?: ArtifactTags): Promise<Artifact[]> {
    const dir = safePath(this.root, name);
    const versions = await this.versionNumbers(dir);
    const result: Artifact[] = [];

    for (const version of versions.sort((a, b) => a - b)) {
      const artifact = await this.read(dir, version);
      if (artifact && matchesTags(artifact.tags, tagFilter)) result.push(artifact);
    }
    return result;
  }

  async get(name: string, version: number): Promise<Artifact | null> {
    return this.read(safePath(this.root, name), version);
  }

  private async read(dir: string, version: number): Promise<Artifact | null> {
    const filePath = path.join(dir, `v${version}.json`);
    const data = await readJsonFile(filePath);
    if (data === null) return null;
    if (!isArtifact(data)) {
      throw new Error(`Corrupt artifact record: ${filePath}`);
    }
    return data;
  }

  private async versionNumbers(dir: string): Promise<number[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(dir);
    } catch (e) {
      if (isErrnoException(e) && e.code === "ENOENT") return [];
      throw e;
    }
    const versions: number[] = [];
    for (const entry of entries) {
      const m = VERSION_FILE.exec(entry);
      if (m?.[1]) versions.push(Number(m[1]));
    }
    return versions;
  }
}
