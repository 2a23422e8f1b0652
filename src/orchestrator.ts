import { randomUUID } from "node:crypto";
import { errorMessage } from "./errors.js";
import { runPhases } from "./executor/phases.js";
import { Scheduler } from "./executor/scheduler.js";
import { ShellTaskRunner } from "./executor/task-runner.js";
import type { ScheduleOptions, TaskRunner } from "./executor/types.js";
import { loadMission } from "./mission/mission.js";
import type { Mission } from "./mission/types.js";
import type { RunStore } from "./persistence/store.js";
import { buildReport, type MissionReport, writeReport } from "./report/report.js";
import { log } from "./utils/logger.js";

export type RunCallbacks = Pick<ScheduleOptions, "onTaskStart" | "onTaskEnd" | "onTaskBlocked">;

export type RunOptions = {
  /** Where to persist the report. Nothing is written when omitted. */
  reportPath?: string;
  signal?: AbortSignal;
  callbacks?: RunCallbacks;
};

export type MissionRun = {
  runId: string;
  report: MissionReport;
  /** Absolute path the report was written to, if any. */
  reportPath: string | null;
};

export type OrchestratorOptions = {
  /** Override task execution (for testing). Defaults to a ShellTaskRunner in `cwd`. */
  runner?: TaskRunner;
  /** Record finished runs here. */
  store?: RunStore;
  /** Base directory for relative write targets and task commands. */
  cwd?: string;
};

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export class Orchestrator {
  private runner: TaskRunner;
  private store?: RunStore;
  private cwd?: string;

  constructor(opts?: OrchestratorOptions) {
    this.runner = opts?.runner ?? new ShellTaskRunner({ cwd: opts?.cwd });
    this.store = opts?.store;
    this.cwd = opts?.cwd;
  }

  /** Read and validate a mission file. Throws ValidationError listing every issue. */
  load(missionPath: string): Promise<Mission> {
    return loadMission(missionPath, { cwd: this.cwd });
  }

  async runFile(missionPath: string, opts?: RunOptions): Promise<MissionRun> {
    return this.run(await this.load(missionPath), opts);
  }

  /** Schedule every task, run the phase gate, then build and persist the report. */
  async run(mission: Mission, opts?: RunOptions): Promise<MissionRun> {
    const runId = randomUUID();
    const startedAt = new Date().toISOString();
    const start = performance.now();
    const signal = opts?.signal ?? new AbortController().signal;

    log.info(`Mission started`, {
      runId,
      mission: mission.path,
      mode: mission.mode,
      tasks: mission.tasks.length,
      maxConcurrency: mission.maxConcurrency,
    });

    const scheduled = await new Scheduler(this.runner).execute(mission, {
      signal,
      ...opts?.callbacks,
    });
    const phases = await runPhases(mission, scheduled.results, this.runner, signal);

    const report = buildReport({
      mission,
      results: scheduled.results,
      phases,
      cancelled: scheduled.cancelled || signal.aborted,
      startedAt,
      endedAt: new Date().toISOString(),
      elapsedSec: (performance.now() - start) / 1000,
    });

    const reportPath = opts?.reportPath ? await writeReport(opts.reportPath, report) : null;

    log.info(`Mission ${report.status}`, {
      runId,
      durationSec: report.duration_sec,
      failedOrBlocked: report.failed_or_blocked,
    });

    this.record(runId, report, reportPath);
    return { runId, report, reportPath };
  }

  private record(runId: string, report: MissionReport, reportPath: string | null): void {
    if (!this.store) return;
    try {
      this.store.insert({
        runId,
        missionPath: report.mission.path ?? "(inline)",
        status: report.status,
        cancelled: report.cancelled,
        startedAt: report.started_at,
        finishedAt: report.ended_at,
        durationSec: report.duration_sec,
        failedOrBlocked: report.failed_or_blocked,
        reportPath,
      });
    } catch (err) {
      // History is best effort; the report on disk is authoritative.
      log.warn("Failed to record run history", { error: errorMessage(err) });
    }
  }
}
