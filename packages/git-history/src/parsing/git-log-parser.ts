import type { CommitRecord } from "@ponyfactor/core";

const COMMIT_LINE_PATTERN =
  /^(?<hash>[0-9a-fA-F]+)\s+(?<date>\d{4}-\d{2}-\d{2})\s+(?<time>\d{2}:\d{2}:\d{2})\s+(?<offset>[+-]\d{4})\s+(?<name>.+)$/;

export class MalformedHistoryLineError extends Error {
  readonly lineNumber: number;
  readonly line: string;

  constructor(lineNumber: number, line: string) {
    super(`Unexpected git log output on line ${lineNumber}: ${JSON.stringify(line)}`);
    this.name = "MalformedHistoryLineError";
    this.lineNumber = lineNumber;
    this.line = line;
  }
}

export const parseCommitLine = (line: string, lineNumber: number): CommitRecord => {
  const groups = COMMIT_LINE_PATTERN.exec(line)?.groups;
  const hash = groups?.["hash"];
  const date = groups?.["date"];
  const time = groups?.["time"];
  const offset = groups?.["offset"];
  const authorName = groups?.["name"];
  if (
    hash === undefined ||
    date === undefined ||
    time === undefined ||
    offset === undefined ||
    authorName === undefined
  ) {
    throw new MalformedHistoryLineError(lineNumber, line);
  }

  return {
    hash,
    authoredDate: `${date} ${time} ${offset}`,
    authorName,
  };
};

export const parseGitLog = (rawLog: string): readonly CommitRecord[] => {
  const commits: CommitRecord[] = [];
  const lines = rawLog.split("\n");

  for (let i = 0; i < lines.length; i += 1) {
    const line = lines[i]?.trimEnd() ?? "";
    if (line.length === 0) {
      continue;
    }

    commits.push(parseCommitLine(line, i + 1));
  }

  return commits;
};
