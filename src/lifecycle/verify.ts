import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { type MissionRun, Orchestrator } from "../orchestrator.js";
import type { ProjectLayout } from "../project/layout.js";

export const VERIFY_MODES = ["parallel"] as const;
export type VerifyMode = (typeof VERIFY_MODES)[number];

export function isVerifyMode(mode: string): mode is VerifyMode {
  return VERIFY_MODES.some((m) => m === mode);
}

/** Bundled reference mission for a verify mode (same relative spot from src/ and dist/). */
export function templatePath(mode: VerifyMode): string {
  return fileURLToPath(new URL(`../../templates/mission.${mode}.json`, import.meta.url));
}

export type VerifyOutcome = {
  ok: boolean;
  run: MissionRun;
};

/**
 * Run the bundled reference mission and check it ends `succeeded` with
 * nothing failed or blocked.
 */
export async function runVerification(
  mode: VerifyMode,
  layout: ProjectLayout,
  orchestrator: Orchestrator = new Orchestrator({ cwd: layout.root }),
): Promise<VerifyOutcome> {
  const run = await orchestrator.runFile(templatePath(mode), {
    reportPath: join(layout.reportsDir, "verify-report.json"),
  });
  const ok = run.report.status === "succeeded" && run.report.failed_or_blocked.length === 0;
  return { ok, run };
}
