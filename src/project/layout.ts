import { existsSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { isErrnoException } from "../errors.js";

export const STATE_DIR_NAME = ".missionctl";

const SUBDIRS = ["state", "missions", "reports", "logs", "locks"] as const;

/**
 * Starter config written by `init`. Concurrency and retries are left out so
 * each mission's mode supplies them.
 */
const INITIAL_CONFIG = {
  default_mode: "balanced",
  default_timeout_sec: 300,
};

export type ProjectLayout = {
  root: string;
  home: string;
  stateDir: string;
  missionsDir: string;
  reportsDir: string;
  logsDir: string;
  locksDir: string;
  configPath: string;
  markerPath: string;
  historyPath: string;
  activeLogPath: string;
};

export function resolveLayout(root: string = process.cwd()): ProjectLayout {
  const absRoot = resolve(root);
  const home = join(absRoot, STATE_DIR_NAME);
  const stateDir = join(home, "state");
  return {
    root: absRoot,
    home,
    stateDir,
    missionsDir: join(home, "missions"),
    reportsDir: join(home, "reports"),
    logsDir: join(home, "logs"),
    locksDir: join(home, "locks"),
    configPath: join(home, "config.json"),
    markerPath: join(stateDir, "active.json"),
    historyPath: join(stateDir, "runs.db"),
    activeLogPath: join(home, "logs", "active.log"),
  };
}

export function isInitialized(layout: ProjectLayout): boolean {
  return existsSync(layout.home);
}

/** Report path used when the caller names none. */
export function defaultReportPath(layout: ProjectLayout, background = false): string {
  if (background) return join(layout.reportsDir, "active-report.json");
  return isInitialized(layout) ? join(layout.reportsDir, "last-report.json") : join(layout.root, "mission-report.json");
}

/**
 * Create the state directory tree. Safe to repeat: existing directories and an
 * existing config.json are left alone. Returns whether the config was written.
 */
export async function initProject(layout: ProjectLayout): Promise<{ configCreated: boolean }> {
  for (const name of SUBDIRS) {
    await mkdir(join(layout.home, name), { recursive: true });
  }
  try {
    await writeFile(layout.configPath, `${JSON.stringify(INITIAL_CONFIG, null, 2)}\n`, {
      encoding: "utf-8",
      flag: "wx",
    });
    return { configCreated: true };
  } catch (err) {
    if (isErrnoException(err) && err.code === "EEXIST") return { configCreated: false };
    throw err;
  }
}
