import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { CommitRecord } from "@ponyfactor/core";
import type {
  FetchedWorkingCopy,
  HistoryProgressEvent,
  HistorySource,
} from "../application/history-source.js";
import { EMPTY_HISTORY_MARKERS, GIT_LOG_FORMAT } from "../domain/git-log-format.js";
import { parseGitLog } from "../parsing/git-log-parser.js";
import { GitCommandError, type GitCommandClient } from "./git-command-client.js";

export type GitHistorySourceOptions = {
  remoteBaseUrl: string;
  tempDirectory: string;
};

export const DEFAULT_REMOTE_BASE_URL = "https://github.com";

const CLONE_DIRECTORY_NAME = "repository";

export const buildFetchUrl = (ownerSlashRepo: string, remoteBaseUrl: string): string =>
  `${remoteBaseUrl.replace(/\/+$/, "")}/${ownerSlashRepo.replace(/^\/+|\/+$/g, "")}.git`;

const isEmptyHistoryError = (error: GitCommandError): boolean => {
  const lower = error.message.toLowerCase();
  return EMPTY_HISTORY_MARKERS.some((marker) => lower.includes(marker));
};

export class GitCliHistorySource implements HistorySource {
  private readonly options: GitHistorySourceOptions;

  constructor(
    private readonly gitClient: GitCommandClient,
    options: Partial<GitHistorySourceOptions> = {},
  ) {
    this.options = {
      remoteBaseUrl: DEFAULT_REMOTE_BASE_URL,
      tempDirectory: tmpdir(),
      ...options,
    };
  }

  fetch(ownerSlashRepo: string): FetchedWorkingCopy {
    const tempRoot = mkdtempSync(join(this.options.tempDirectory, "ponyfactor-"));
    const localPath = join(tempRoot, CLONE_DIRECTORY_NAME);
    const release = (): void => rmSync(tempRoot, { recursive: true, force: true });
    const url = buildFetchUrl(ownerSlashRepo, this.options.remoteBaseUrl);

    try {
      this.gitClient.run(tempRoot, ["clone", "--quiet", url, CLONE_DIRECTORY_NAME]);
    } catch (error) {
      if (error instanceof GitCommandError) {
        return { success: false, localPath, reason: error.message, release };
      }

      release();
      throw error;
    }

    return { success: true, localPath, release };
  }

  listCommits(
    localPath: string,
    onProgress?: (event: HistoryProgressEvent) => void,
  ): readonly CommitRecord[] {
    let output: string;
    try {
      output = this.gitClient.run(localPath, ["log", `--pretty=format:${GIT_LOG_FORMAT}`]);
    } catch (error) {
      if (error instanceof GitCommandError && isEmptyHistoryError(error)) {
        output = "";
      } else {
        throw error;
      }
    }

    onProgress?.({ stage: "git_log_received", bytes: Buffer.byteLength(output, "utf8") });
    const commits = parseGitLog(output);
    onProgress?.({ stage: "git_log_parsed", commits: commits.length });
    return commits;
  }
}
