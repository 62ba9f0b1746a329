import { resolve } from "node:path";
import type { PonyFactorResult } from "@ponyfactor/core";
import { calculatePonyFactor, type PonyFactorProgressEvent } from "@ponyfactor/calculator";
import { createGitHistorySource, type HistorySource } from "@ponyfactor/git-history";
import { createSilentLogger, type Logger } from "./logger.js";

export type PonyFactorCommandOptions = {
  directory: boolean;
  remoteBaseUrl?: string;
};

export const resolveLocation = (location: string, directory: boolean, cwd: string): string =>
  directory ? resolve(cwd, location) : location;

const createProgressReporter = (logger: Logger): ((event: PonyFactorProgressEvent) => void) => {
  return (event) => {
    switch (event.stage) {
      case "fetching_repository":
        logger.info(`cloning ${event.location}`);
        break;
      case "repository_fetched":
        logger.debug(`working copy ready at ${event.localPath}`);
        break;
      case "loading_commit_history":
        logger.info("loading git history");
        break;
      case "history":
        if (event.event.stage === "git_log_received") {
          logger.debug(`git log loaded (${event.event.bytes} bytes)`);
        } else {
          logger.info(`parsed ${event.event.commits} commits`);
        }
        break;
      case "working_copy_released":
        logger.debug(`removed working copy ${event.localPath}`);
        break;
      case "computing_pony_factor":
        logger.info(`computing pony factor over ${event.commits} commits`);
        break;
      case "calculation_completed":
        logger.debug(`calculation completed (available=${event.available})`);
        break;
    }
  };
};

export const runPonyFactorCommand = (
  location: string,
  options: PonyFactorCommandOptions,
  logger: Logger = createSilentLogger(),
  historySource: HistorySource = createGitHistorySource(
    options.remoteBaseUrl === undefined ? {} : { remoteBaseUrl: options.remoteBaseUrl },
  ),
): PonyFactorResult => {
  const invocationCwd = process.env["INIT_CWD"] ?? process.cwd();
  const target = resolveLocation(location, options.directory, invocationCwd);
  logger.info(`analyzing ${options.directory ? "local repository" : "remote repository"}: ${target}`);

  const result = calculatePonyFactor(
    { location: target, fromLocalDirectory: options.directory },
    historySource,
    createProgressReporter(logger),
  );

  if (result.available) {
    logger.info(`pony factor computed (${result.ponyFactor} of ${result.metrics.totalContributors} contributors)`);
  } else {
    logger.warn(
      `coverage undefined: ${result.metrics.activeContributors} active contributors cover ${result.coveragePercent}% of the threshold`,
    );
  }

  return result;
};
