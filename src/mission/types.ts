import type { ErrorCause } from "../errors.js";

export type MissionMode = "fast" | "balanced" | "strict";

export type TaskRunState =
  | "pending"
  | "ready"
  | "running"
  | "succeeded"
  | "failed"
  | "blocked"
  | "cancelled";

export type TerminalTaskState = Extract<TaskRunState, "succeeded" | "failed" | "blocked" | "cancelled">;

/** A task after validation: effective timeout/retries applied, write targets normalized. */
export type MissionTask = {
  id: string;
  command: string;
  dependsOn: string[];
  writes: string[];
  /** Seconds; undefined means no timeout. */
  timeoutSec?: number;
  retries: number;
};

export type PhaseName = "integrate" | "verify";

export type MissionPhase = {
  name: PhaseName;
  command: string;
  timeoutSec?: number;
  retries: number;
};

export type Mission = {
  /** Absolute path of the definition file, when loaded from disk. */
  path?: string;
  objective?: string;
  mode: MissionMode;
  maxConcurrency: number;
  defaultTimeoutSec?: number;
  defaultRetries: number;
  /** Declaration order; doubles as the admission tie-break. */
  tasks: MissionTask[];
  integrate?: MissionPhase;
  verify?: MissionPhase;
};

export type AttemptLog = {
  attempt: number;
  startedAt: string;
  endedAt: string;
  durationSec: number;
  exitCode: number;
  stdout: string;
  stderr: string;
  /** Null when the process ran to completion on its own. */
  error: string | null;
  timedOut: boolean;
  cancelled: boolean;
};

export type TaskResult = {
  id: string;
  status: TerminalTaskState;
  attempts: number;
  startedAt: string | null;
  endedAt: string | null;
  durationSec: number;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  error: ErrorCause | null;
  attemptLogs: AttemptLog[];
};
