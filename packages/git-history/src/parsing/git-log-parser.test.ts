import { describe, expect, it } from "vitest";
import { MalformedHistoryLineError, parseGitLog } from "./git-log-parser.js";

describe("parseGitLog", () => {
  it("parses one commit per line and keeps whitespace inside author names", () => {
    const raw = [
      "a1b2c3d 2024-06-02 10:00:00 +0200 Alice Liddell",
      "0f0f0f0 2024-06-01 09:30:15 -0500 Bob",
      "",
    ].join("\n");

    expect(parseGitLog(raw)).toEqual([
      { hash: "a1b2c3d", authoredDate: "2024-06-02 10:00:00 +0200", authorName: "Alice Liddell" },
      { hash: "0f0f0f0", authoredDate: "2024-06-01 09:30:15 -0500", authorName: "Bob" },
    ]);
  });

  it("collapses repeated separators between date fields", () => {
    const commits = parseGitLog("abc123  2023-01-05   08:00:00\t+0000  Carol  de la Cruz\r\n");

    expect(commits).toEqual([
      { hash: "abc123", authoredDate: "2023-01-05 08:00:00 +0000", authorName: "Carol  de la Cruz" },
    ]);
  });

  it("returns no commits for empty output", () => {
    expect(parseGitLog("")).toEqual([]);
    expect(parseGitLog("\n\n")).toEqual([]);
  });

  it("rejects lines that do not match the log format", () => {
    const raw = ["abc123 2024-06-01 10:00:00 +0000 Alice", "not-a-hash 2024-06-01 10:00:00 +0000 Bob"].join(
      "\n",
    );

    expect(() => parseGitLog(raw)).toThrow(MalformedHistoryLineError);
    try {
      parseGitLog(raw);
    } catch (error) {
      expect(error).toMatchObject({
        lineNumber: 2,
        line: "not-a-hash 2024-06-01 10:00:00 +0000 Bob",
      });
    }
  });

  it("rejects lines without an author name", () => {
    expect(() => parseGitLog("abc123 2024-06-01 10:00:00 +0000")).toThrow(MalformedHistoryLineError);
  });
});
