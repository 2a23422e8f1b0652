import { execa } from "execa";
import { getConfig } from "../config.js";
import {
  type ErrorCause,
  TaskCancelledError,
  TaskFailureError,
  TaskTimeoutError,
} from "../errors.js";
import type { AttemptLog, TaskResult } from "../mission/types.js";
import { log } from "../utils/logger.js";
import { killProcessTree, spawnsProcessGroups } from "../utils/process.js";
import { withRetry } from "../utils/retry.js";
import type { RunnableTask, TaskRunner } from "./types.js";

export type ShellTaskRunnerOptions = {
  /** Working directory for commands (default: process.cwd()). */
  cwd?: string;
  /** Extra environment on top of the inherited one. */
  env?: Record<string, string>;
  /** Truncate captured stdout/stderr to this many characters. */
  outputLimit?: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  /** How long a cancelled attempt gets after SIGTERM before its group is killed. */
  killGraceMs?: number;
};

// setTimeout fires at once for delays above this
const MAX_TIMER_MS = 2_147_483_647;

/** Runs each attempt as a shell child process in its own process group. */
export class ShellTaskRunner implements TaskRunner {
  private cwd?: string;
  private env?: Record<string, string>;
  private outputLimit: number;
  private retryBaseDelayMs: number;
  private retryMaxDelayMs: number;
  private killGraceMs: number;

  constructor(opts?: ShellTaskRunnerOptions) {
    const config = getConfig();
    this.cwd = opts?.cwd;
    this.env = opts?.env;
    this.outputLimit = opts?.outputLimit ?? config.runner.outputTruncation;
    this.retryBaseDelayMs = opts?.retryBaseDelayMs ?? config.retry.baseDelayMs;
    this.retryMaxDelayMs = opts?.retryMaxDelayMs ?? config.retry.maxDelayMs;
    this.killGraceMs = opts?.killGraceMs ?? config.runner.killGraceMs;
  }

  async run(task: RunnableTask, signal: AbortSignal): Promise<TaskResult> {
    const attempts: AttemptLog[] = [];

    await withRetry(
      async (attempt) => {
        const entry = await this.runAttempt(task, attempt, signal);
        attempts.push(entry);
        if (entry.exitCode !== 0) {
          log.debug(`Attempt ${attempt} of "${task.id}" failed`, {
            exitCode: entry.exitCode,
            error: entry.error,
          });
        }
        return entry;
      },
      {
        maxAttempts: task.retries + 1,
        baseDelayMs: this.retryBaseDelayMs,
        maxDelayMs: this.retryMaxDelayMs,
        retryIf: (entry) => entry.exitCode !== 0 && !entry.cancelled,
        signal,
      },
    );

    return summarize(task, attempts);
  }

  async runAttempt(task: RunnableTask, attempt: number, signal: AbortSignal): Promise<AttemptLog> {
    const { timeoutExitCode, cancelExitCode } = getConfig().runner;
    const startedAt = new Date().toISOString();
    const start = performance.now();

    if (signal.aborted) {
      return {
        attempt,
        startedAt,
        endedAt: startedAt,
        durationSec: 0,
        exitCode: cancelExitCode,
        stdout: "",
        stderr: "",
        error: "cancelled before start",
        timedOut: false,
        cancelled: true,
      };
    }

    const child = execa(task.command, {
      shell: true,
      cwd: this.cwd,
      env: this.env,
      stdin: "ignore",
      reject: false,
      detached: spawnsProcessGroups(),
    });

    let timedOut = false;
    let cancelled = false;
    let killTimer: NodeJS.Timeout | undefined;

    const terminate = (sig: NodeJS.Signals): void => {
      if (child.pid === undefined) return;
      killProcessTree(child.pid, sig);
    };
    const onAbort = (): void => {
      if (timedOut) return;
      cancelled = true;
      terminate("SIGTERM");
      killTimer = setTimeout(() => terminate("SIGKILL"), this.killGraceMs);
    };
    const clearTimeoutTimer =
      task.timeoutSec !== undefined
        ? longTimeout(task.timeoutSec * 1000, () => {
            if (cancelled) return;
            timedOut = true;
            terminate("SIGKILL");
          })
        : undefined;
    signal.addEventListener("abort", onAbort, { once: true });

    try {
      const res = await child;
      const endedAt = new Date().toISOString();
      const durationSec = roundSec((performance.now() - start) / 1000);

      let exitCode = typeof res.exitCode === "number" ? res.exitCode : 1;
      let error: string | null = null;
      if (timedOut) {
        exitCode = timeoutExitCode;
        error = new TaskTimeoutError(task.id, task.timeoutSec ?? 0).message;
      } else if (cancelled) {
        exitCode = cancelExitCode;
        error = new TaskCancelledError(task.id).message;
      } else if (res.signal) {
        error = `terminated by ${res.signal}`;
      } else if (res.failed && res instanceof Error) {
        error = res.message.split("\n")[0];
      }

      return {
        attempt,
        startedAt,
        endedAt,
        durationSec,
        exitCode,
        stdout: truncate(res.stdout, this.outputLimit),
        stderr: truncate(res.stderr, this.outputLimit),
        error,
        timedOut,
        cancelled,
      };
    } finally {
      clearTimeoutTimer?.();
      if (killTimer) clearTimeout(killTimer);
      signal.removeEventListener("abort", onAbort);
    }
  }
}

/** Fold attempt logs into a task result. */
export function summarize(task: Pick<RunnableTask, "id">, attempts: AttemptLog[]): TaskResult {
  const final = attempts[attempts.length - 1];
  if (!final) {
    return {
      id: task.id,
      status: "cancelled",
      attempts: 0,
      startedAt: null,
      endedAt: null,
      durationSec: 0,
      exitCode: null,
      stdout: "",
      stderr: "",
      error: new TaskCancelledError(task.id).toCause(),
      attemptLogs: [],
    };
  }

  const status = final.exitCode === 0 ? "succeeded" : final.cancelled ? "cancelled" : "failed";
  return {
    id: task.id,
    status,
    attempts: attempts.length,
    startedAt: attempts[0].startedAt,
    endedAt: final.endedAt,
    durationSec: roundSec(attempts.reduce((sum, a) => sum + a.durationSec, 0)),
    exitCode: final.exitCode,
    stdout: final.stdout,
    stderr: final.stderr,
    error: status === "succeeded" ? null : attemptCause(task.id, final, attempts.length),
    attemptLogs: attempts,
  };
}

function attemptCause(taskId: string, final: AttemptLog, attempts: number): ErrorCause {
  if (final.cancelled) return new TaskCancelledError(taskId).toCause();
  if (final.timedOut) return { code: "TASK_TIMEOUT", message: final.error ?? "timed out" };
  const cause = new TaskFailureError(taskId, final.exitCode, attempts).toCause();
  return final.error ? { ...cause, message: `${cause.message}: ${final.error}` } : cause;
}

/** Like setTimeout, but chains timers for delays beyond the platform limit. Returns a canceller. */
function longTimeout(ms: number, fn: () => void): () => void {
  let timer: NodeJS.Timeout | undefined;
  const arm = (remaining: number): void => {
    const step = Math.min(remaining, MAX_TIMER_MS);
    timer = setTimeout(() => (remaining > step ? arm(remaining - step) : fn()), step);
  };
  arm(ms);
  return () => clearTimeout(timer);
}

export function roundSec(sec: number): number {
  return Math.max(0, Math.round(sec * 1000) / 1000);
}

function truncate(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}...(truncated)` : text;
}
