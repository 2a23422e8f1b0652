import { type ChildProcess, spawn } from "node:child_process";
import { closeSync, openSync } from "node:fs";
import { mkdir } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { getConfig } from "../config.js";
import { errorMessage, LifecycleError } from "../errors.js";
import { defaultReportPath, type ProjectLayout } from "../project/layout.js";
import type { ActiveRunMarker } from "../schemas.js";
import { log } from "../utils/logger.js";
import { isProcessAlive, killProcessTree, spawnsProcessGroups, waitForExit } from "../utils/process.js";
import { readMarker, removeMarker } from "./marker.js";

export type StartOptions = {
  layout: ProjectLayout;
  missionPath: string;
  reportPath?: string;
  quiet?: boolean;
  /**
   * Leading argv for the detached process, before `run <mission> ...`.
   * Defaults to re-invoking the current CLI with the same Node flags.
   */
  entry?: string[];
};

export type StartedRun = {
  pid: number;
  log: string;
  report: string;
  mission: string;
  /** The run finished before `start` returned; its outcome is in the log and report. */
  exited: boolean;
};

export type ActiveRun = {
  marker: ActiveRunMarker;
  alive: boolean;
};

export type CancelOutcome =
  | { status: "none" }
  | { status: "stale"; pid: number }
  | { status: "stopped"; pid: number; forced: boolean };

export async function readActiveRun(layout: ProjectLayout): Promise<ActiveRun | null> {
  const marker = await readMarker(layout.markerPath);
  if (!marker) return null;
  return { marker, alive: isProcessAlive(marker.pid) };
}

/**
 * Launch `run` as a detached process whose output goes to the active log.
 * The child writes and removes its own marker; this waits until it has
 * registered (or already exited) so `status` sees it as soon as we return.
 */
export async function startBackgroundRun(opts: StartOptions): Promise<StartedRun> {
  const { layout } = opts;
  const active = await readActiveRun(layout);
  if (active?.alive) {
    throw new LifecycleError(
      "RUN_ALREADY_ACTIVE",
      `an active mission is already running (pid: ${active.marker.pid})`,
    );
  }
  if (active) {
    log.info(`Removing stale run marker`, { pid: active.marker.pid });
    await removeMarker(layout.markerPath);
  }

  const mission = resolve(layout.root, opts.missionPath);
  const report = resolve(layout.root, opts.reportPath ?? defaultReportPath(layout, true));
  await mkdir(dirname(layout.activeLogPath), { recursive: true });
  await mkdir(dirname(report), { recursive: true });

  const entry = opts.entry ?? [...process.execArgv, process.argv[1]];
  const args = [...entry, "run", mission, "--report", report, "--background"];
  if (opts.quiet) args.push("--quiet");

  const fd = openSync(layout.activeLogPath, "a");
  let child: ChildProcess;
  try {
    child = spawn(process.execPath, args, {
      cwd: layout.root,
      detached: spawnsProcessGroups(),
      stdio: ["ignore", fd, fd],
    });
  } finally {
    closeSync(fd);
  }

  let exited = false;
  child.once("exit", () => {
    exited = true;
  });
  child.on("error", (err) => {
    exited = true;
    log.error("Background run failed to start", { error: errorMessage(err) });
  });
  child.unref();

  const { pid } = child;
  if (pid === undefined) {
    throw new LifecycleError("SPAWN_FAILED", `failed to start background run for ${mission}`);
  }

  const { startTimeoutMs, pollIntervalMs } = getConfig().lifecycle;
  const outcome = await waitForRegistration(layout.markerPath, pid, () => exited, startTimeoutMs, pollIntervalMs);
  if (outcome === "timeout") {
    log.warn(`Run ${pid} has not registered after ${startTimeoutMs}ms`, { log: layout.activeLogPath });
  }
  log.debug("Background run started", { pid, mission, outcome });
  return { pid, log: layout.activeLogPath, report, mission, exited: outcome === "exited" };
}

async function waitForRegistration(
  markerPath: string,
  pid: number,
  hasExited: () => boolean,
  timeoutMs: number,
  pollIntervalMs: number,
): Promise<"registered" | "exited" | "timeout"> {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    const marker = await readMarker(markerPath);
    if (marker?.pid === pid) return "registered";
    if (hasExited()) return "exited";
    if (Date.now() >= deadline) return "timeout";
    await new Promise((r) => setTimeout(r, pollIntervalMs));
  }
}

/**
 * Stop the active background run: SIGTERM, wait out the grace period, then
 * SIGKILL. The run cancels its own attempts on SIGTERM, so the grace period
 * outlasts the runner's kill grace. The marker is removed in every case.
 */
export async function cancelActiveRun(layout: ProjectLayout): Promise<CancelOutcome> {
  const active = await readActiveRun(layout);
  if (!active) return { status: "none" };

  const { pid } = active.marker;
  if (!active.alive) {
    await removeMarker(layout.markerPath);
    return { status: "stale", pid };
  }

  const { cancelGraceMs, pollIntervalMs } = getConfig().lifecycle;
  killProcessTree(pid, "SIGTERM");
  let forced = false;
  if (!(await waitForExit(pid, cancelGraceMs, pollIntervalMs))) {
    log.warn(`Run ${pid} ignored SIGTERM, killing`);
    killProcessTree(pid, "SIGKILL");
    forced = true;
    await waitForExit(pid, cancelGraceMs, pollIntervalMs);
  }

  await removeMarker(layout.markerPath);
  return { status: "stopped", pid, forced };
}
