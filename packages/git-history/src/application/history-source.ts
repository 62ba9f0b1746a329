import type { CommitRecord } from "@ponyfactor/core";

export type HistoryProgressEvent =
  | { stage: "git_log_received"; bytes: number }
  | { stage: "git_log_parsed"; commits: number };

/**
 * A working copy obtained by {@link HistorySource.fetch}. The caller owns the directory
 * and must call `release` once it no longer needs it, whether or not the fetch succeeded.
 */
export type FetchedWorkingCopy =
  | { success: true; localPath: string; release: () => void }
  | { success: false; localPath: string; reason: string; release: () => void };

export interface HistorySource {
  fetch(ownerSlashRepo: string): FetchedWorkingCopy;
  listCommits(
    localPath: string,
    onProgress?: (event: HistoryProgressEvent) => void,
  ): readonly CommitRecord[];
}
