import { describe, expect, it } from "vitest";
import { deriveMissionStatus, failedOrBlocked, runPhases } from "../src/executor/phases.js";
import { summarize } from "../src/executor/task-runner.js";
import type { RunnableTask, TaskRunner } from "../src/executor/types.js";
import { parseMission } from "../src/mission/mission.js";
import type { TaskResult } from "../src/mission/types.js";

/** Exits with the code configured for each command. */
class ScriptedRunner implements TaskRunner {
  seen: RunnableTask[] = [];

  constructor(private exitCodes: Record<string, number> = {}) {}

  async run(task: RunnableTask): Promise<TaskResult> {
    this.seen.push(task);
    const now = new Date().toISOString();
    return summarize(task, [
      {
        attempt: 1,
        startedAt: now,
        endedAt: now,
        durationSec: 0,
        exitCode: this.exitCodes[task.command] ?? 0,
        stdout: "",
        stderr: "",
        error: null,
        timedOut: false,
        cancelled: false,
      },
    ]);
  }
}

const mission = parseMission({
  default_timeout_sec: 7,
  tasks: [
    { id: "a", command: "build a" },
    { id: "b", command: "build b", depends_on: ["a"] },
  ],
  integrate: { command: "merge", retries: 2 },
  verify: { command: "check" },
});

function resultsWith(statuses: Record<string, TaskResult["status"]>): Record<string, TaskResult> {
  return Object.fromEntries(
    Object.entries(statuses).map(([id, status]) => [id, { ...summarize({ id }, []), status, error: null }]),
  );
}

const signal = () => new AbortController().signal;

describe("runPhases", () => {
  it("runs integrate then verify after every task succeeded", async () => {
    const runner = new ScriptedRunner();
    const phases = await runPhases(mission, resultsWith({ a: "succeeded", b: "succeeded" }), runner, signal());

    expect(runner.seen).toEqual([
      { id: "integrate", command: "merge", timeoutSec: 7, retries: 2 },
      { id: "verify", command: "check", timeoutSec: 7, retries: 0 },
    ]);
    expect(phases.skipped).toBe(false);
    expect(phases.integrate?.status).toBe("succeeded");
    expect(phases.verify?.status).toBe("succeeded");
  });

  it("skips verify when integrate fails", async () => {
    const runner = new ScriptedRunner({ merge: 1 });
    const results = resultsWith({ a: "succeeded", b: "succeeded" });
    const phases = await runPhases(mission, results, runner, signal());

    expect(phases.verify).toBeNull();
    expect(phases.integrate?.error).toEqual({
      code: "INTEGRATION_FAILURE",
      message: "integrate failed: exited with code 1 after 1 attempt",
    });
    expect(failedOrBlocked(mission, results, phases)).toEqual(["integrate"]);
    expect(deriveMissionStatus(mission, results, phases)).toBe("failed");
  });

  it("records a verify failure", async () => {
    const runner = new ScriptedRunner({ check: 4 });
    const results = resultsWith({ a: "succeeded", b: "succeeded" });
    const phases = await runPhases(mission, results, runner, signal());

    expect(phases.verify?.error?.code).toBe("VERIFICATION_FAILURE");
    expect(phases.verify?.error?.message).toBe("verify failed: exited with code 4 after 1 attempt");
    expect(failedOrBlocked(mission, results, phases)).toEqual(["verify"]);
  });

  it("runs no phase when a task did not succeed", async () => {
    const runner = new ScriptedRunner();
    const results = resultsWith({ a: "failed", b: "blocked" });
    const phases = await runPhases(mission, results, runner, signal());

    expect(runner.seen).toEqual([]);
    expect(phases).toEqual({ integrate: null, verify: null, skipped: true });
    expect(failedOrBlocked(mission, results, phases)).toEqual(["a", "b"]);
    expect(deriveMissionStatus(mission, results, phases)).toBe("failed");
  });
});

describe("deriveMissionStatus", () => {
  it("succeeds only when tasks and phases all succeeded", () => {
    const ok = resultsWith({ a: "succeeded", b: "succeeded" });
    expect(deriveMissionStatus(mission, ok, { integrate: null, verify: null })).toBe("succeeded");
    expect(deriveMissionStatus(mission, resultsWith({ a: "succeeded", b: "cancelled" }), { integrate: null, verify: null })).toBe(
      "failed",
    );
  });
});
