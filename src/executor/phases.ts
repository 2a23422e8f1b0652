import { IntegrationFailureError, VerificationFailureError } from "../errors.js";
import type { Mission, MissionPhase, PhaseName, TaskResult } from "../mission/types.js";
import { log } from "../utils/logger.js";
import type { TaskRunner } from "./types.js";

export type PhaseResults = {
  integrate: TaskResult | null;
  verify: TaskResult | null;
  /** Set when tasks did not all succeed and no phase ran. */
  skipped: boolean;
};

export type MissionStatus = "succeeded" | "failed";

/**
 * The phase gate: integrate, then verify, only after every task succeeded.
 * A failed integrate skips verify.
 */
export async function runPhases(
  mission: Mission,
  taskResults: Record<string, TaskResult>,
  runner: TaskRunner,
  signal: AbortSignal,
): Promise<PhaseResults> {
  const allSucceeded = mission.tasks.every((t) => taskResults[t.id]?.status === "succeeded");
  if (!allSucceeded || signal.aborted) {
    if (mission.integrate || mission.verify) log.info("Skipping integrate/verify: not every task succeeded");
    return { integrate: null, verify: null, skipped: true };
  }

  const integrate = mission.integrate ? await runPhase(mission.integrate, runner, signal) : null;
  if (integrate && integrate.status !== "succeeded") {
    return { integrate, verify: null, skipped: false };
  }

  const verify = mission.verify ? await runPhase(mission.verify, runner, signal) : null;
  return { integrate, verify, skipped: false };
}

async function runPhase(phase: MissionPhase, runner: TaskRunner, signal: AbortSignal): Promise<TaskResult> {
  log.info(`Running ${phase.name}`);
  const result = await runner.run(
    { id: phase.name, command: phase.command, timeoutSec: phase.timeoutSec, retries: phase.retries },
    signal,
  );
  if (result.status === "succeeded" || result.status === "cancelled") return result;

  const detail = result.error?.message ?? `exit code ${result.exitCode ?? "unknown"}`;
  const error = phaseError(phase.name, detail);
  log.warn(error.message);
  return { ...result, error: error.toCause() };
}

function phaseError(name: PhaseName, detail: string): IntegrationFailureError | VerificationFailureError {
  return name === "integrate" ? new IntegrationFailureError(detail) : new VerificationFailureError(detail);
}

/** Ids of tasks that did not succeed (declaration order), then failed phases. */
export function failedOrBlocked(
  mission: Mission,
  taskResults: Record<string, TaskResult>,
  phases: Pick<PhaseResults, "integrate" | "verify">,
): string[] {
  const out = mission.tasks
    .filter((t) => {
      const status = taskResults[t.id]?.status;
      return status === "failed" || status === "blocked";
    })
    .map((t) => t.id);
  if (phases.integrate && phases.integrate.status !== "succeeded") out.push("integrate");
  if (phases.verify && phases.verify.status !== "succeeded") out.push("verify");
  return out;
}

export function deriveMissionStatus(
  mission: Mission,
  taskResults: Record<string, TaskResult>,
  phases: Pick<PhaseResults, "integrate" | "verify">,
): MissionStatus {
  const tasksOk = mission.tasks.every((t) => taskResults[t.id]?.status === "succeeded");
  const integrateOk = !phases.integrate || phases.integrate.status === "succeeded";
  const verifyOk = !phases.verify || phases.verify.status === "succeeded";
  return tasksOk && integrateOk && verifyOk ? "succeeded" : "failed";
}
