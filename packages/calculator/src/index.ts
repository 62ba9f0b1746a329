import type { PonyFactorResult } from "@ponyfactor/core";
import { createGitHistorySource, type GitHistorySourceOptions } from "@ponyfactor/git-history";
import {
  calculatePonyFactor,
  type CalculatePonyFactorInput,
  type PonyFactorProgressEvent,
} from "./application/calculate-pony-factor.js";

export {
  RepositoryFetchError,
  calculatePonyFactor,
  type CalculatePonyFactorInput,
  type PonyFactorProgressEvent,
} from "./application/calculate-pony-factor.js";
export {
  aggregateContributors,
  computePonyFactor,
  computeRecencyCutoff,
  filterRecentContributors,
  rankContributors,
  selectCoveringContributors,
} from "./domain/pony-factor-metrics.js";
export { DEFAULT_PONY_FACTOR_CONFIG, type PonyFactorConfig } from "./domain/pony-factor-types.js";

export const calculatePonyFactorFromGit = (
  input: CalculatePonyFactorInput,
  sourceOptions: Partial<GitHistorySourceOptions> = {},
  onProgress?: (event: PonyFactorProgressEvent) => void,
): PonyFactorResult => calculatePonyFactor(input, createGitHistorySource(sourceOptions), onProgress);
