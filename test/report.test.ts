import { existsSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ReportWriteError } from "../src/errors.js";
import { summarize } from "../src/executor/task-runner.js";
import { parseMission } from "../src/mission/mission.js";
import type { TaskResult } from "../src/mission/types.js";
import { buildReport, writeReport } from "../src/report/report.js";

const mission = {
  ...parseMission({
    objective: "ship it",
    mode: "strict",
    tasks: [
      { id: "b", command: "true" },
      { id: "a", command: "false" },
      { id: "c", command: "true", depends_on: ["a"] },
    ],
  }),
  path: "/work/mission.json",
};

const succeeded: TaskResult = {
  id: "b",
  status: "succeeded",
  attempts: 1,
  startedAt: "2026-01-01T00:00:00.000Z",
  endedAt: "2026-01-01T00:00:01.000Z",
  durationSec: 1,
  exitCode: 0,
  stdout: "ok",
  stderr: "",
  error: null,
  attemptLogs: [
    {
      attempt: 1,
      startedAt: "2026-01-01T00:00:00.000Z",
      endedAt: "2026-01-01T00:00:01.000Z",
      durationSec: 1,
      exitCode: 0,
      stdout: "ok",
      stderr: "",
      error: null,
      timedOut: false,
      cancelled: false,
    },
  ],
};

const results: Record<string, TaskResult> = {
  // insertion order differs from declaration order on purpose
  c: { ...summarize({ id: "c" }, []), status: "blocked", error: { code: "BLOCKED_BY_DEPENDENCY", message: "blocked by failed dependency: a" } },
  a: { ...summarize({ id: "a" }, []), status: "failed", error: { code: "TASK_FAILURE", message: "exited with code 1 after 2 attempts" } },
  b: succeeded,
};

describe("buildReport", () => {
  it("renders the report in declaration order", () => {
    const report = buildReport({
      mission,
      results,
      phases: { integrate: null, verify: null },
      cancelled: false,
      startedAt: "2026-01-01T00:00:00.000Z",
      endedAt: "2026-01-01T00:00:02.000Z",
      elapsedSec: 1.23456,
    });

    expect(report.mission).toEqual({
      path: "/work/mission.json",
      objective: "ship it",
      mode: "strict",
      max_concurrency: 3,
    });
    expect(report.status).toBe("failed");
    expect(report.duration_sec).toBe(1.235);
    expect(report.failed_or_blocked).toEqual(["a", "c"]);
    expect(report.cancelled_tasks).toEqual([]);
    expect(Object.keys(report.tasks)).toEqual(["b", "a", "c"]);
    expect(report.tasks.b).toEqual({
      id: "b",
      status: "succeeded",
      attempts: 1,
      started_at: "2026-01-01T00:00:00.000Z",
      ended_at: "2026-01-01T00:00:01.000Z",
      duration_sec: 1,
      exit_code: 0,
      stdout: "ok",
      stderr: "",
      error: null,
      attempt_logs: [
        {
          attempt: 1,
          started_at: "2026-01-01T00:00:00.000Z",
          ended_at: "2026-01-01T00:00:01.000Z",
          duration_sec: 1,
          exit_code: 0,
          stdout: "ok",
          stderr: "",
          error: null,
        },
      ],
    });
    expect(report.integrate).toBeNull();
  });

  it("never reports a negative duration and lists cancelled tasks", () => {
    const report = buildReport({
      mission,
      results: { ...results, a: { ...results.a, status: "cancelled" }, c: { ...results.c, status: "cancelled" } },
      phases: { integrate: null, verify: null },
      cancelled: true,
      startedAt: "2026-01-01T00:00:00.000Z",
      endedAt: "2026-01-01T00:00:00.000Z",
      elapsedSec: -0.5,
    });

    expect(report.duration_sec).toBe(0);
    expect(report.cancelled).toBe(true);
    expect(report.cancelled_tasks).toEqual(["a", "c"]);
    expect(report.failed_or_blocked).toEqual([]);
    expect(report.status).toBe("failed");
  });
});

describe("writeReport", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "missionctl-report-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const report = () =>
    buildReport({
      mission,
      results,
      phases: { integrate: null, verify: null },
      cancelled: false,
      startedAt: "2026-01-01T00:00:00.000Z",
      endedAt: "2026-01-01T00:00:01.000Z",
      elapsedSec: 1,
    });

  it("creates parent directories and leaves no temp files", async () => {
    const target = join(dir, "nested", "deeper", "report.json");
    const written = await writeReport(target, report());

    expect(written).toBe(target);
    expect(JSON.parse(readFileSync(target, "utf-8")).failed_or_blocked).toEqual(["a", "c"]);
    expect(readdirSync(join(dir, "nested", "deeper"))).toEqual(["report.json"]);
  });

  it("replaces an existing report", async () => {
    const target = join(dir, "report.json");
    writeFileSync(target, "old");
    await writeReport(target, report());
    expect(readFileSync(target, "utf-8").startsWith("{")).toBe(true);
  });

  it("wraps I/O failures", async () => {
    const blocker = join(dir, "file");
    writeFileSync(blocker, "");
    const target = join(blocker, "report.json");

    await expect(writeReport(target, report())).rejects.toBeInstanceOf(ReportWriteError);
    await expect(writeReport(target, report())).rejects.toThrow(`Failed to write report to ${target}:`);
    expect(existsSync(target)).toBe(false);
  });
});
