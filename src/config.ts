import { readFile } from "node:fs/promises";
import { ConfigError, errorMessage, isErrnoException } from "./errors.js";
import type { MissionMode } from "./mission/types.js";
import { ProjectConfigSchema } from "./schemas.js";
import type { LogLevel } from "./utils/logger.js";

export type ModeDefaults = {
  maxConcurrency: number;
  defaultRetries: number;
};

export type MissionctlConfig = {
  defaults: {
    mode: MissionMode;
    /** Mission-level overrides from the project config; unset falls through to the mode table. */
    maxConcurrency?: number;
    timeoutSec?: number;
    retries?: number;
  };
  modes: Record<MissionMode, ModeDefaults>;
  retry: {
    baseDelayMs: number;
    maxDelayMs: number;
  };
  runner: {
    timeoutExitCode: number;
    cancelExitCode: number;
    outputTruncation: number;
    /** SIGTERM-to-SIGKILL grace for a cancelled attempt. */
    killGraceMs: number;
  };
  lifecycle: {
    /** Must exceed runner.killGraceMs so a cancelled run can still write its report. */
    cancelGraceMs: number;
    /** How long `start` waits for the detached run to register itself. */
    startTimeoutMs: number;
    pollIntervalMs: number;
  };
  logLevel: LogLevel;
};

type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: MissionctlConfig = {
  defaults: {
    mode: "balanced",
  },
  modes: {
    fast: { maxConcurrency: 6, defaultRetries: 0 },
    balanced: { maxConcurrency: 4, defaultRetries: 1 },
    strict: { maxConcurrency: 3, defaultRetries: 1 },
  },
  retry: {
    baseDelayMs: 0,
    maxDelayMs: 5_000,
  },
  runner: {
    timeoutExitCode: 124,
    cancelExitCode: 130,
    outputTruncation: 4_000,
    killGraceMs: 2_000,
  },
  lifecycle: {
    cancelGraceMs: 5_000,
    startTimeoutMs: 10_000,
    pollIntervalMs: 100,
  },
  logLevel: "info",
};

let current: MissionctlConfig = structuredClone(DEFAULTS);

function isPlainObject(val: unknown): val is Record<string, unknown> {
  return typeof val === "object" && val !== null && !Array.isArray(val);
}

function deepMerge<T extends Record<string, unknown>>(base: T, overrides: DeepPartial<T>): T {
  const result: Record<string, unknown> = structuredClone(base);
  for (const [key, val] of Object.entries(overrides)) {
    const existing = result[key];
    if (isPlainObject(val) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result as T;
}

/** Override config values. Merges deeply with defaults. */
export function configure(overrides: DeepPartial<MissionctlConfig>): void {
  current = deepMerge(DEFAULTS, overrides);
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<MissionctlConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<MissionctlConfig> = Object.freeze(structuredClone(DEFAULTS));

/**
 * Read `.missionctl/config.json` and translate it into config overrides.
 * A missing file yields no overrides.
 */
export async function readProjectConfig(configPath: string): Promise<DeepPartial<MissionctlConfig>> {
  let raw: string;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return {};
    throw new ConfigError(`Cannot read config ${configPath}: ${errorMessage(err)}`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config ${configPath} is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }

  const result = ProjectConfigSchema.safeParse(parsed);
  if (!result.success) {
    const detail = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config ${configPath}: ${detail}`);
  }

  const file = result.data;
  return {
    defaults: {
      mode: file.default_mode,
      maxConcurrency: file.max_concurrency,
      timeoutSec: file.default_timeout_sec,
      retries: file.default_retries,
    },
    retry: {
      baseDelayMs: file.retry?.base_delay_ms,
      maxDelayMs: file.retry?.max_delay_ms,
    },
    runner: {
      outputTruncation: file.output_truncation,
    },
    logLevel: file.log_level,
  };
}

/** Load a project config file and apply it on top of the defaults. */
export async function loadProjectConfig(configPath: string): Promise<Readonly<MissionctlConfig>> {
  configure(await readProjectConfig(configPath));
  return getConfig();
}
