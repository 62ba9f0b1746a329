import { ExecGitCommandClient } from "./infrastructure/git-command-client.js";
import {
  GitCliHistorySource,
  type GitHistorySourceOptions,
} from "./infrastructure/git-history-source.js";

export type {
  FetchedWorkingCopy,
  HistoryProgressEvent,
  HistorySource,
} from "./application/history-source.js";
export {
  ExecGitCommandClient,
  GitCommandError,
  type GitCommandClient,
} from "./infrastructure/git-command-client.js";
export {
  DEFAULT_REMOTE_BASE_URL,
  GitCliHistorySource,
  buildFetchUrl,
  type GitHistorySourceOptions,
} from "./infrastructure/git-history-source.js";
export { MalformedHistoryLineError, parseGitLog } from "./parsing/git-log-parser.js";

export const createGitHistorySource = (
  options: Partial<GitHistorySourceOptions> = {},
): GitCliHistorySource => new GitCliHistorySource(new ExecGitCommandClient(), options);
