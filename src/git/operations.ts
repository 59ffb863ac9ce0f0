import { simpleGit } from "simple-git";
import type { SourceRevision } from "../types/services.js";

/** The part of simple-git used to read the current revision. */
export type RevisionGit = {
  checkIsRepo(): Promise<boolean>;
  revparse(options: string[]): Promise<string>;
};

/**
 * Source revision of the working tree the master list lives in. Recorded
 * on registered artifacts as `source_sha`; outside a repository there is none.
 */
export class GitOperations implements SourceRevision {
  private git: RevisionGit;

  constructor(repoPath: string, git?: RevisionGit) {
    this.git = git ?? simpleGit(repoPath);
  }

  async currentSha(): Promise<string | null> {
    try {
      if (!(await this.git.checkIsRepo())) return null;
      const sha = await this.git.revparse(["HEAD"]);
      return sha.trim() || null;
    } catch (e) {
      // No git binary, or a repository with no commits yet.
      console.warn(`[trainctl] Could not read HEAD: ${e instanceof Error ? e.message : String(e)}`);
      return null;
    }
  }
}
