import { describe, expect, it } from "vitest";
import { createStderrLogger, parseLogLevel } from "./logger.js";

describe("createStderrLogger", () => {
  it("writes prefixed lines at or above the configured level", () => {
    const lines: string[] = [];
    const logger = createStderrLogger("warn", (line) => lines.push(line));

    logger.debug("skipped");
    logger.info("skipped");
    logger.warn("clone is slow");
    logger.error("clone failed");

    expect(lines).toEqual(["[ponyfactor] WARN clone is slow\n", "[ponyfactor] ERROR clone failed\n"]);
  });

  it("writes nothing when silent", () => {
    const lines: string[] = [];
    const logger = createStderrLogger("silent", (line) => lines.push(line));

    logger.error("ignored");

    expect(lines).toEqual([]);
  });
});

describe("parseLogLevel", () => {
  it("accepts known levels and falls back to info", () => {
    expect(parseLogLevel("debug")).toBe("debug");
    expect(parseLogLevel("verbose")).toBe("info");
    expect(parseLogLevel(undefined)).toBe("info");
  });
});
