import { readFile, stat } from "node:fs/promises";
import { resolve } from "node:path";
import { getConfig, type MissionctlConfig } from "../config.js";
import { errorMessage, ValidationError } from "../errors.js";
import {
  formatIssues,
  MissionHeaderSchema,
  type PhaseDefinition,
  TaskDefinitionSchema,
  type TaskDefinition,
} from "../schemas.js";
import { findCycles } from "./task-graph.js";
import type { Mission, MissionMode, MissionPhase, MissionTask, PhaseName } from "./types.js";
import { normalizeWriteTargets } from "./write-targets.js";

export type ParseMissionOptions = {
  /** Base directory for relative write-target paths (default: process.cwd()). */
  cwd?: string;
  /** Absolute path recorded on the mission. */
  path?: string;
  config?: Readonly<MissionctlConfig>;
};

/** Read, parse and validate a mission definition file. */
export async function loadMission(
  missionPath: string,
  opts?: Omit<ParseMissionOptions, "path">,
): Promise<Mission> {
  const absolute = resolve(missionPath);

  let raw: string;
  try {
    const info = await stat(absolute);
    if (!info.isFile()) {
      throw new ValidationError([`mission path is not a file: ${absolute}`]);
    }
    raw = await readFile(absolute, "utf-8");
  } catch (err) {
    if (err instanceof ValidationError) throw err;
    throw new ValidationError([`mission file not readable: ${absolute} (${errorMessage(err)})`]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ValidationError([`invalid JSON in ${absolute}: ${errorMessage(err)}`]);
  }

  return parseMission(parsed, { ...opts, path: absolute });
}

/**
 * Validate a mission definition. Every violation found is collected into a
 * single ValidationError; nothing is returned for a partially valid mission.
 */
export function parseMission(raw: unknown, opts?: ParseMissionOptions): Mission {
  const config = opts?.config ?? getConfig();
  const issues: string[] = [];

  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ValidationError(["mission root must be a JSON object"]);
  }

  const header = MissionHeaderSchema.safeParse(raw);
  if (!header.success) issues.push(...formatIssues(header.error));

  const rawTasks: unknown[] = "tasks" in raw && Array.isArray(raw.tasks) ? raw.tasks : [];
  const definitions: Array<TaskDefinition | null> = rawTasks.map((entry, i) => {
    const result = TaskDefinitionSchema.safeParse(entry);
    if (!result.success) {
      issues.push(...formatIssues(result.error, `tasks[${i}]`));
      return null;
    }
    return result.data;
  });

  const mode: MissionMode = (header.success ? header.data.mode : undefined) ?? config.defaults.mode;
  const modeDefaults = config.modes[mode];
  const defaultTimeoutSec = header.success
    ? header.data.default_timeout_sec ?? config.defaults.timeoutSec
    : undefined;
  const defaultRetries =
    (header.success ? header.data.default_retries : undefined) ??
    config.defaults.retries ??
    modeDefaults.defaultRetries;
  const maxConcurrency =
    (header.success ? header.data.max_concurrency : undefined) ??
    config.defaults.maxConcurrency ??
    modeDefaults.maxConcurrency;

  const tasks = buildTasks(
    definitions,
    declaredIds(rawTasks),
    { defaultTimeoutSec, defaultRetries, cwd: opts?.cwd },
    issues,
  );

  if (!header.success || issues.length > 0) {
    throw new ValidationError(issues);
  }

  return {
    path: opts?.path,
    objective: header.data.objective,
    mode,
    maxConcurrency,
    defaultTimeoutSec,
    defaultRetries,
    tasks,
    integrate: toPhase("integrate", header.data.integrate, defaultTimeoutSec),
    verify: toPhase("verify", header.data.verify, defaultTimeoutSec),
  };
}

/** Ids named by raw task entries, including entries that fail validation elsewhere. */
function declaredIds(rawTasks: unknown[]): Set<string> {
  const ids = new Set<string>();
  for (const entry of rawTasks) {
    if (typeof entry !== "object" || entry === null || !("id" in entry)) continue;
    if (typeof entry.id === "string" && entry.id.length > 0) ids.add(entry.id);
  }
  return ids;
}

function buildTasks(
  definitions: Array<TaskDefinition | null>,
  declared: ReadonlySet<string>,
  defaults: { defaultTimeoutSec?: number; defaultRetries: number; cwd?: string },
  issues: string[],
): MissionTask[] {
  const tasks: MissionTask[] = [];
  const seen = new Set<string>();

  definitions.forEach((def, i) => {
    if (!def) return;

    if (seen.has(def.id)) {
      issues.push(`tasks[${i}]: duplicate task id "${def.id}"`);
      return;
    }
    seen.add(def.id);

    const dependsOn = [...new Set(def.depends_on)];
    for (const dep of dependsOn) {
      if (dep === def.id) {
        issues.push(`task "${def.id}" depends on itself`);
      } else if (!declared.has(dep)) {
        issues.push(`task "${def.id}" depends on unknown task "${dep}"`);
      }
    }

    const { keys, invalid } = normalizeWriteTargets(def.writes, defaults.cwd);
    for (const index of invalid) {
      issues.push(`tasks[${i}].writes[${index}]: write target must be a non-empty path or logical:<name>`);
    }

    tasks.push({
      id: def.id,
      command: def.command,
      dependsOn: dependsOn.filter((dep) => dep !== def.id),
      writes: keys,
      timeoutSec: def.timeout_sec ?? defaults.defaultTimeoutSec,
      retries: def.retries ?? defaults.defaultRetries,
    });
  });

  for (const cycle of findCycles(tasks)) {
    issues.push(`dependency cycle: ${cycle.join(" -> ")}`);
  }

  return tasks;
}

function toPhase(
  name: PhaseName,
  def: PhaseDefinition | null | undefined,
  defaultTimeoutSec: number | undefined,
): MissionPhase | undefined {
  if (!def) return undefined;
  return {
    name,
    command: def.command,
    timeoutSec: def.timeout_sec ?? defaultTimeoutSec,
    retries: def.retries ?? 0,
  };
}
