import type { CommitRecord, PonyFactorResult } from "@ponyfactor/core";
import type { HistoryProgressEvent, HistorySource } from "@ponyfactor/git-history";
import { computePonyFactor } from "../domain/pony-factor-metrics.js";
import { DEFAULT_PONY_FACTOR_CONFIG, type PonyFactorConfig } from "../domain/pony-factor-types.js";

export type CalculatePonyFactorInput = {
  location: string;
  fromLocalDirectory: boolean;
  config?: Partial<PonyFactorConfig>;
  now?: Date;
};

export type PonyFactorProgressEvent =
  | { stage: "fetching_repository"; location: string }
  | { stage: "repository_fetched"; localPath: string }
  | { stage: "loading_commit_history"; localPath: string }
  | { stage: "history"; event: HistoryProgressEvent }
  | { stage: "computing_pony_factor"; commits: number }
  | { stage: "working_copy_released"; localPath: string }
  | { stage: "calculation_completed"; available: boolean };

export class RepositoryFetchError extends Error {
  readonly location: string;
  readonly reason: string;

  constructor(location: string, reason: string) {
    super(`Failed to fetch repository ${location}: ${reason}`);
    this.name = "RepositoryFetchError";
    this.location = location;
    this.reason = reason;
  }
}

const createEffectiveConfig = (
  overrides: Partial<PonyFactorConfig> | undefined,
): PonyFactorConfig => ({
  ...DEFAULT_PONY_FACTOR_CONFIG,
  ...overrides,
});

const loadCommits = (
  localPath: string,
  historySource: HistorySource,
  onProgress: ((event: PonyFactorProgressEvent) => void) | undefined,
): readonly CommitRecord[] => {
  onProgress?.({ stage: "loading_commit_history", localPath });
  return historySource.listCommits(localPath, (event) => onProgress?.({ stage: "history", event }));
};

const loadRemoteCommits = (
  location: string,
  historySource: HistorySource,
  onProgress: ((event: PonyFactorProgressEvent) => void) | undefined,
): readonly CommitRecord[] => {
  onProgress?.({ stage: "fetching_repository", location });
  const workingCopy = historySource.fetch(location);
  try {
    if (!workingCopy.success) {
      throw new RepositoryFetchError(location, workingCopy.reason);
    }

    onProgress?.({ stage: "repository_fetched", localPath: workingCopy.localPath });
    return loadCommits(workingCopy.localPath, historySource, onProgress);
  } finally {
    workingCopy.release();
    onProgress?.({ stage: "working_copy_released", localPath: workingCopy.localPath });
  }
};

export const calculatePonyFactor = (
  input: CalculatePonyFactorInput,
  historySource: HistorySource,
  onProgress?: (event: PonyFactorProgressEvent) => void,
): PonyFactorResult => {
  const commits = input.fromLocalDirectory
    ? loadCommits(input.location, historySource, onProgress)
    : loadRemoteCommits(input.location, historySource, onProgress);

  onProgress?.({ stage: "computing_pony_factor", commits: commits.length });
  const result = computePonyFactor(
    input.location,
    commits,
    createEffectiveConfig(input.config),
    input.now ?? new Date(),
  );
  onProgress?.({ stage: "calculation_completed", available: result.available });
  return result;
};
