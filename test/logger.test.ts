import { afterEach, describe, expect, it } from "vitest";
import { formatMsg, getLogLevel, log, setLogLevel, setLogSink } from "../src/utils/logger.js";

describe("logger", () => {
  afterEach(() => {
    setLogLevel("info");
    setLogSink();
  });

  it("formats timestamped lines with optional data", () => {
    expect(formatMsg("info", "hello")).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[INFO\] hello$/);
    expect(formatMsg("warn", "x", { a: 1 })).toMatch(/\[WARN\] x \{"a":1\}$/);
    expect(formatMsg("debug", "y", {})).toMatch(/\[DEBUG\] y$/);
  });

  it("filters by level", () => {
    const lines: string[] = [];
    setLogSink((level, line) => lines.push(`${level}:${line.split("] ")[1]}`));

    setLogLevel("warn");
    log.debug("d");
    log.info("i");
    log.warn("w");
    log.error("e");
    expect(lines).toEqual(["warn:w", "error:e"]);
    expect(getLogLevel()).toBe("warn");

    lines.length = 0;
    setLogLevel("silent");
    log.error("hidden");
    expect(lines).toEqual([]);
  });
});
