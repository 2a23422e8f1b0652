import {
  BlockedByDependencyError,
  errorMessage,
  OrchestratorError,
  TaskCancelledError,
} from "../errors.js";
import { topologicalOrder } from "../mission/task-graph.js";
import type { Mission, MissionTask, TaskResult, TaskRunState } from "../mission/types.js";
import { log } from "../utils/logger.js";
import { LockManager } from "./lock-manager.js";
import type { ScheduleOptions, ScheduleResult, TaskRunner } from "./types.js";

type Settled = { task: MissionTask; result: TaskResult };

const TERMINAL: ReadonlySet<TaskRunState> = new Set(["succeeded", "failed", "blocked", "cancelled"]);
const BLOCKING: ReadonlySet<TaskRunState> = new Set(["failed", "blocked"]);

export function isTerminal(state: TaskRunState): boolean {
  return TERMINAL.has(state);
}

/**
 * Drives a validated mission to completion: admits ready tasks in declaration
 * order under the concurrency cap and write-target locks, and reacts to each
 * completion as it happens.
 */
export class Scheduler {
  private runner: TaskRunner;

  constructor(runner: TaskRunner) {
    this.runner = runner;
  }

  async execute(mission: Mission, opts?: ScheduleOptions): Promise<ScheduleResult> {
    const states = new Map<string, TaskRunState>(mission.tasks.map((t) => [t.id, "pending"]));
    const results = new Map<string, TaskResult>();
    const locks = new LockManager();
    const running = new Map<string, Promise<Settled>>();
    const order = topologicalOrder(mission.tasks);
    const cap = Math.max(1, mission.maxConcurrency);

    // The runner always gets a signal; the caller's (if any) feeds into it.
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    if (opts?.signal?.aborted) controller.abort();
    opts?.signal?.addEventListener("abort", onAbort, { once: true });
    const signal = controller.signal;

    const propagateBlocked = (): void => {
      for (const task of order) {
        if (states.get(task.id) !== "pending") continue;
        const failedDeps = task.dependsOn.filter((dep) => BLOCKING.has(states.get(dep) ?? "pending"));
        if (failedDeps.length === 0) continue;

        states.set(task.id, "blocked");
        results.set(task.id, unattempted(task.id, "blocked", new BlockedByDependencyError(task.id, failedDeps).toCause()));
        log.warn(`Task "${task.id}" blocked`, { dependencies: failedDeps });
        opts?.onTaskBlocked?.(task, failedDeps);
      }
    };

    const markReady = (): void => {
      for (const task of mission.tasks) {
        if (states.get(task.id) !== "pending") continue;
        if (task.dependsOn.every((dep) => states.get(dep) === "succeeded")) {
          states.set(task.id, "ready");
        }
      }
    };

    const admit = (): void => {
      for (const task of mission.tasks) {
        if (running.size >= cap) return;
        if (states.get(task.id) !== "ready") continue;

        if (!locks.tryAcquire(task.id, task.writes)) {
          log.debug(`Task "${task.id}" waiting on write targets`, {
            held: locks.conflicts(task.writes, task.id),
          });
          // strict: nothing declared later may overtake a waiting task
          if (mission.mode === "strict") return;
          continue;
        }

        states.set(task.id, "running");
        log.info(`Starting "${task.id}"`);
        opts?.onTaskStart?.(task);
        running.set(task.id, this.launch(task, signal));
      }
    };

    try {
      for (;;) {
        propagateBlocked();
        if (!signal.aborted) {
          markReady();
          admit();
        }

        if (running.size === 0) {
          if (signal.aborted || [...states.values()].every(isTerminal)) break;
          throw new OrchestratorError(
            "SCHEDULER_STALLED",
            `No task can be admitted: ${describeWaiting(mission.tasks, states)}`,
          );
        }

        const { task, result } = await Promise.race(running.values());
        running.delete(task.id);
        locks.release(task.id);
        states.set(task.id, result.status);
        results.set(task.id, result);

        if (result.status === "succeeded") {
          log.info(`Task "${task.id}" succeeded`, { durationSec: result.durationSec });
        } else {
          log.warn(`Task "${task.id}" ${result.status}`, { error: result.error?.message });
        }
        opts?.onTaskEnd?.(task, result);
      }
    } finally {
      opts?.signal?.removeEventListener("abort", onAbort);
    }

    for (const task of mission.tasks) {
      if (isTerminal(states.get(task.id) ?? "pending")) continue;
      states.set(task.id, "cancelled");
      results.set(task.id, unattempted(task.id, "cancelled", new TaskCancelledError(task.id).toCause()));
    }

    const ordered: Record<string, TaskResult> = {};
    for (const task of mission.tasks) {
      const result = results.get(task.id);
      if (result) ordered[task.id] = result;
    }

    return {
      mission,
      results: ordered,
      states: Object.fromEntries(states),
      cancelled: signal.aborted,
    };
  }

  private async launch(task: MissionTask, signal: AbortSignal): Promise<Settled> {
    try {
      return { task, result: await this.runner.run(task, signal) };
    } catch (err) {
      // A runner that throws is a failed task, never a failed mission.
      const message = errorMessage(err);
      return {
        task,
        result: {
          ...unattempted(task.id, "failed", { code: "TASK_FAILURE", message }),
          stderr: message,
        },
      };
    }
  }
}

function unattempted(
  id: string,
  status: TaskResult["status"],
  error: TaskResult["error"],
): TaskResult {
  return {
    id,
    status,
    attempts: 0,
    startedAt: null,
    endedAt: null,
    durationSec: 0,
    exitCode: null,
    stdout: "",
    stderr: "",
    error,
    attemptLogs: [],
  };
}

function describeWaiting(tasks: MissionTask[], states: Map<string, TaskRunState>): string {
  return tasks
    .filter((t) => !isTerminal(states.get(t.id) ?? "pending"))
    .map((t) => `${t.id} (${states.get(t.id)})`)
    .join(", ");
}
