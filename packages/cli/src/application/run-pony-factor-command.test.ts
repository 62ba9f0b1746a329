import type { CommitRecord } from "@ponyfactor/core";
import type { FetchedWorkingCopy, HistorySource } from "@ponyfactor/git-history";
import { describe, expect, it } from "vitest";
import { createStderrLogger } from "./logger.js";
import { resolveLocation, runPonyFactorCommand } from "./run-pony-factor-command.js";

class StubHistorySource implements HistorySource {
  released = false;

  constructor(private readonly commits: readonly CommitRecord[]) {}

  fetch(_ownerSlashRepo: string): FetchedWorkingCopy {
    return {
      success: true,
      localPath: "/tmp/ponyfactor-test/repository",
      release: () => {
        this.released = true;
      },
    };
  }

  listCommits(_localPath: string, onProgress?: Parameters<HistorySource["listCommits"]>[1]) {
    onProgress?.({ stage: "git_log_received", bytes: 120 });
    onProgress?.({ stage: "git_log_parsed", commits: this.commits.length });
    return this.commits;
  }
}

describe("resolveLocation", () => {
  it("resolves local directories against the invocation directory", () => {
    expect(resolveLocation("repo", true, "/work")).toBe("/work/repo");
    expect(resolveLocation("/abs/repo", true, "/work")).toBe("/abs/repo");
  });

  it("leaves owner/repo identifiers untouched", () => {
    expect(resolveLocation("octo/widgets", false, "/work")).toBe("octo/widgets");
  });
});

describe("runPonyFactorCommand", () => {
  it("logs progress while computing a remote pony factor", () => {
    const lines: string[] = [];
    const source = new StubHistorySource([]);

    const result = runPonyFactorCommand(
      "octo/widgets",
      { directory: false },
      createStderrLogger("info", (line) => lines.push(line)),
      source,
    );

    expect(result).toMatchObject({ location: "octo/widgets", available: true, ponyFactor: 0 });
    expect(source.released).toBe(true);
    expect(lines).toEqual([
      "[ponyfactor] INFO analyzing remote repository: octo/widgets\n",
      "[ponyfactor] INFO cloning octo/widgets\n",
      "[ponyfactor] INFO loading git history\n",
      "[ponyfactor] INFO parsed 0 commits\n",
      "[ponyfactor] INFO computing pony factor over 0 commits\n",
      "[ponyfactor] INFO pony factor computed (0 of 0 contributors)\n",
    ]);
  });
});
