import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { ReportWriteError, type ErrorCause } from "../errors.js";
import { deriveMissionStatus, failedOrBlocked, type MissionStatus, type PhaseResults } from "../executor/phases.js";
import { roundSec } from "../executor/task-runner.js";
import type { AttemptLog, Mission, MissionMode, TaskResult, TerminalTaskState } from "../mission/types.js";

export type AttemptLogJson = {
  attempt: number;
  started_at: string;
  ended_at: string;
  duration_sec: number;
  exit_code: number;
  stdout: string;
  stderr: string;
  error: string | null;
};

export type TaskResultJson = {
  id: string;
  status: TerminalTaskState;
  attempts: number;
  started_at: string | null;
  ended_at: string | null;
  duration_sec: number;
  exit_code: number | null;
  stdout: string;
  stderr: string;
  error: ErrorCause | null;
  attempt_logs: AttemptLogJson[];
};

/** The on-disk mission report. Field names are part of the file format. */
export type MissionReport = {
  mission: {
    path: string | null;
    objective: string | null;
    mode: MissionMode;
    max_concurrency: number;
  };
  status: MissionStatus;
  cancelled: boolean;
  started_at: string;
  ended_at: string;
  duration_sec: number;
  failed_or_blocked: string[];
  cancelled_tasks: string[];
  tasks: Record<string, TaskResultJson>;
  integrate: TaskResultJson | null;
  verify: TaskResultJson | null;
};

export type BuildReportInput = {
  mission: Mission;
  results: Record<string, TaskResult>;
  phases: Pick<PhaseResults, "integrate" | "verify">;
  cancelled: boolean;
  startedAt: string;
  endedAt: string;
  /** Monotonic elapsed seconds, from performance.now(). */
  elapsedSec: number;
};

export function buildReport(input: BuildReportInput): MissionReport {
  const { mission, results, phases } = input;
  const tasks: Record<string, TaskResultJson> = {};
  for (const task of mission.tasks) {
    const result = results[task.id];
    if (result) tasks[task.id] = taskResultToJson(result);
  }

  return {
    mission: {
      path: mission.path ?? null,
      objective: mission.objective ?? null,
      mode: mission.mode,
      max_concurrency: mission.maxConcurrency,
    },
    status: deriveMissionStatus(mission, results, phases),
    cancelled: input.cancelled,
    started_at: input.startedAt,
    ended_at: input.endedAt,
    duration_sec: roundSec(input.elapsedSec),
    failed_or_blocked: failedOrBlocked(mission, results, phases),
    cancelled_tasks: mission.tasks.filter((t) => results[t.id]?.status === "cancelled").map((t) => t.id),
    tasks,
    integrate: phases.integrate ? taskResultToJson(phases.integrate) : null,
    verify: phases.verify ? taskResultToJson(phases.verify) : null,
  };
}

export function taskResultToJson(result: TaskResult): TaskResultJson {
  return {
    id: result.id,
    status: result.status,
    attempts: result.attempts,
    started_at: result.startedAt,
    ended_at: result.endedAt,
    duration_sec: result.durationSec,
    exit_code: result.exitCode,
    stdout: result.stdout,
    stderr: result.stderr,
    error: result.error,
    attempt_logs: result.attemptLogs.map(attemptToJson),
  };
}

function attemptToJson(a: AttemptLog): AttemptLogJson {
  return {
    attempt: a.attempt,
    started_at: a.startedAt,
    ended_at: a.endedAt,
    duration_sec: a.durationSec,
    exit_code: a.exitCode,
    stdout: a.stdout,
    stderr: a.stderr,
    error: a.error,
  };
}

/**
 * Persist a report atomically: write a sibling temp file, then rename it over
 * the target. Returns the absolute path written.
 */
export async function writeReport(reportPath: string, report: MissionReport): Promise<string> {
  const target = resolve(reportPath);
  const tmp = `${target}.tmp-${process.pid}-${Date.now()}`;
  try {
    await mkdir(dirname(target), { recursive: true });
  } catch (err) {
    throw new ReportWriteError(target, err);
  }
  try {
    await writeFile(tmp, `${JSON.stringify(report, null, 2)}\n`, "utf-8");
    await rename(tmp, target);
  } catch (err) {
    await rm(tmp, { force: true });
    throw new ReportWriteError(target, err);
  }
  return target;
}
