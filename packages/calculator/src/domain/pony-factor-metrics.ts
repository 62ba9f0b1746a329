import type { CommitRecord, ContributorStat, PonyFactorResult } from "@ponyfactor/core";
import type { PonyFactorConfig } from "./pony-factor-types.js";

const round2 = (value: number): number => Number(value.toFixed(2));

const pad = (value: number, width: number): string => String(value).padStart(width, "0");

// Dates stay in their fixed-width string form; `>` on them orders chronologically.
const compareDateStrings = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export const aggregateContributors = (
  commits: readonly CommitRecord[],
): ReadonlyMap<string, ContributorStat> =>
  commits.reduce((stats, commit) => {
    const current = stats.get(commit.authorName);
    return stats.set(commit.authorName, {
      name: commit.authorName,
      commitCount: (current?.commitCount ?? 0) + 1,
      lastCommitDate:
        current === undefined || commit.authoredDate > current.lastCommitDate
          ? commit.authoredDate
          : current.lastCommitDate,
    });
  }, new Map<string, ContributorStat>());

/**
 * Orders contributors by commit count, highest first. Equal counts fall back to the more
 * recent last commit, then to the name in code-point order.
 */
export const rankContributors = (
  contributors: Iterable<ContributorStat>,
): readonly ContributorStat[] =>
  [...contributors].sort(
    (a, b) =>
      b.commitCount - a.commitCount ||
      compareDateStrings(b.lastCommitDate, a.lastCommitDate) ||
      compareDateStrings(a.name, b.name),
  );

/**
 * `YYYY-MM-DD` of `now` (UTC) with the year moved back by `windowYears`. Month and day are
 * copied as-is, so Feb 29 yields a date string that never existed; it still sorts correctly.
 */
export const computeRecencyCutoff = (now: Date, windowYears: number): string =>
  `${pad(now.getUTCFullYear() - windowYears, 4)}-${pad(now.getUTCMonth() + 1, 2)}-${pad(now.getUTCDate(), 2)}`;

// A bare `YYYY-MM-DD` sorts before any full date string of the same day, so a contributor
// whose last commit falls on the cutoff day itself is kept.
export const filterRecentContributors = (
  ranked: readonly ContributorStat[],
  cutoff: string,
): readonly ContributorStat[] => ranked.filter((contributor) => contributor.lastCommitDate > cutoff);

export type CoveringSelection =
  | { covered: true; contributors: readonly ContributorStat[]; coveredCommits: number }
  | { covered: false; coveredCommits: number };

export const selectCoveringContributors = (
  ranked: readonly ContributorStat[],
  thresholdCommitCount: number,
): CoveringSelection => {
  const selected: ContributorStat[] = [];
  let coveredCommits = 0;

  for (const contributor of ranked) {
    if (coveredCommits >= thresholdCommitCount) {
      break;
    }

    selected.push(contributor);
    coveredCommits += contributor.commitCount;
  }

  if (coveredCommits < thresholdCommitCount) {
    return { covered: false, coveredCommits };
  }

  return { covered: true, contributors: selected, coveredCommits };
};

export const computePonyFactor = (
  location: string,
  commits: readonly CommitRecord[],
  config: PonyFactorConfig,
  now: Date,
): PonyFactorResult => {
  const contributors = aggregateContributors(commits);
  const ranked = rankContributors(contributors.values());
  const recencyCutoff = computeRecencyCutoff(now, config.recentWindowYears);
  const active = filterRecentContributors(ranked, recencyCutoff);
  const thresholdCommitCount = commits.length * config.coverageThreshold;
  const selection = selectCoveringContributors(active, thresholdCommitCount);

  const metrics = {
    totalCommits: commits.length,
    totalContributors: ranked.length,
    activeContributors: active.length,
    coverageThreshold: config.coverageThreshold,
    thresholdCommitCount,
    coveredCommits: selection.coveredCommits,
    recencyCutoff,
  };

  if (!selection.covered) {
    return {
      location,
      available: false,
      reason: "coverage_undefined",
      coveragePercent: round2((selection.coveredCommits / thresholdCommitCount) * 100),
      metrics,
    };
  }

  return {
    location,
    available: true,
    contributors: selection.contributors,
    ponyFactor: selection.contributors.length,
    metrics,
  };
};
