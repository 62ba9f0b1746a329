export type PonyFactorConfig = {
  /** Share of all commits the selected contributors must reach. */
  coverageThreshold: number;
  /** Contributors without a commit inside this many years are not counted. */
  recentWindowYears: number;
};

export const DEFAULT_PONY_FACTOR_CONFIG: PonyFactorConfig = {
  coverageThreshold: 0.5,
  recentWindowYears: 1,
};
