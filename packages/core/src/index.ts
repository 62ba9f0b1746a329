/**
 * A single commit as reported by `git log`.
 *
 * `authoredDate` uses the fixed-width `YYYY-MM-DD HH:MM:SS ±ZZZZ` layout, so dates are
 * compared as plain strings throughout.
 */
export type CommitRecord = {
  hash: string;
  authoredDate: string;
  authorName: string;
};

export type ContributorStat = {
  name: string;
  lastCommitDate: string;
  commitCount: number;
};

export type PonyFactorMetrics = {
  totalCommits: number;
  totalContributors: number;
  activeContributors: number;
  coverageThreshold: number;
  thresholdCommitCount: number;
  coveredCommits: number;
  recencyCutoff: string;
};

export type PonyFactorAvailable = {
  location: string;
  available: true;
  contributors: readonly ContributorStat[];
  ponyFactor: number;
  metrics: PonyFactorMetrics;
};

export type PonyFactorUnavailable = {
  location: string;
  available: false;
  reason: "coverage_undefined";
  coveragePercent: number;
  metrics: PonyFactorMetrics;
};

export type PonyFactorResult = PonyFactorAvailable | PonyFactorUnavailable;
