import { describe, it, expect } from "vitest";
import { Logger, logger as sharedLogger, type LogLevel } from "./logs.js";

function capture(minLevel: LogLevel): { logger: Logger; lines: Array<[LogLevel, string]> } {
  const lines: Array<[LogLevel, string]> = [];
  const logger = new Logger(minLevel, (level, line) => {
    lines.push([level, line]);
  });
  return { logger, lines };
}

describe("Logger", () => {
  it("should drop entries below the minimum level", () => {
    const { logger, lines } = capture("info");

    logger.debug("hidden");
    logger.info("shown");
    logger.error("also.shown");

    expect(lines.map(([level]) => level)).toEqual(["info", "error"]);
  });

  it("should format timestamp, level, event, target, message and details", () => {
    const { logger, lines } = capture("debug");

    logger.debug("read", {
      op: "read",
      path: "/data/a.json",
      message: "done",
      details: { bytes: 12 },
    });

    expect(lines).toHaveLength(1);
    expect(lines[0]?.[1]).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[DEBUG\] \[read\] read \/data\/a\.json done \{"bytes":12\}$/
    );
  });

  it("should allow changing level and sink at runtime", () => {
    const { logger, lines } = capture("warn");
    logger.info("before");
    logger.setLevel("info");
    logger.info("after");

    const other: string[] = [];
    logger.setSink((_level, line) => other.push(line));
    logger.warn("redirected");

    expect(logger.level).toBe("info");
    expect(lines).toHaveLength(1);
    expect(lines[0]?.[1]).toContain("[INFO] [after]");
    expect(other).toHaveLength(1);
    expect(other[0]).toContain("[WARN] [redirected]");
  });

  it("should keep store debug events silent until the level is lowered", () => {
    expect(sharedLogger.level).toBe("info");
  });
});
