import { z } from "zod";
import { ValidationError } from "./errors.js";

export const MissionModeSchema = z.enum(["fast", "balanced", "strict"]);

const TimeoutSecSchema = z.number().positive("must be a positive number of seconds");
const RetriesSchema = z.number().int("must be an integer").min(0, "must be >= 0");

export const TaskDefinitionSchema = z.object({
  id: z.string({ required_error: "is required" }).min(1, "must be a non-empty string"),
  command: z
    .string({ required_error: "is required" })
    .refine((cmd) => cmd.trim().length > 0, "must be a non-empty string"),
  depends_on: z.array(z.string()).default([]),
  writes: z.array(z.string()).default([]),
  timeout_sec: TimeoutSecSchema.optional(),
  retries: RetriesSchema.optional(),
});

export const PhaseDefinitionSchema = z.object({
  command: z
    .string({ required_error: "is required" })
    .refine((cmd) => cmd.trim().length > 0, "must be a non-empty string"),
  timeout_sec: TimeoutSecSchema.optional(),
  retries: RetriesSchema.optional(),
});

/** Mission-level fields. `tasks` is checked entry by entry so every bad task is reported. */
export const MissionHeaderSchema = z.object({
  objective: z.string().optional(),
  mode: MissionModeSchema.optional(),
  max_concurrency: z.number().int("must be an integer").min(1, "must be >= 1").optional(),
  default_timeout_sec: TimeoutSecSchema.optional(),
  default_retries: RetriesSchema.optional(),
  tasks: z.array(z.unknown(), { required_error: "is required" }).min(1, "must contain at least one task"),
  integrate: PhaseDefinitionSchema.nullable().optional(),
  verify: PhaseDefinitionSchema.nullable().optional(),
});

export const ProjectConfigSchema = z.object({
  default_mode: MissionModeSchema.optional(),
  max_concurrency: z.number().int().min(1).optional(),
  default_timeout_sec: TimeoutSecSchema.optional(),
  default_retries: RetriesSchema.optional(),
  retry: z
    .object({
      base_delay_ms: z.number().int().min(0).optional(),
      max_delay_ms: z.number().int().min(0).optional(),
    })
    .optional(),
  output_truncation: z.number().int().positive().optional(),
  log_level: z.enum(["debug", "info", "warn", "error", "silent"]).optional(),
});

export const ActiveRunMarkerSchema = z.object({
  pid: z.number().int().positive(),
  mission: z.string(),
  report: z.string(),
  log: z.string(),
  started_at: z.string(),
});

export type TaskDefinition = z.infer<typeof TaskDefinitionSchema>;
export type PhaseDefinition = z.infer<typeof PhaseDefinitionSchema>;
export type MissionHeader = z.infer<typeof MissionHeaderSchema>;
export type ProjectConfigFile = z.infer<typeof ProjectConfigSchema>;
export type ActiveRunMarker = z.infer<typeof ActiveRunMarkerSchema>;

/** Render zod issues as `prefix.path: message` lines. */
export function formatIssues(error: z.ZodError, prefix?: string): string[] {
  return error.issues.map((issue) => {
    const path = formatPath(prefix, issue.path);
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/** Parse data with a schema, throwing a ValidationError listing every issue. */
export function parseOrThrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  prefix?: string,
): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(formatIssues(result.error, prefix));
  }
  return result.data;
}

function formatPath(prefix: string | undefined, path: Array<string | number>): string {
  let out = prefix ?? "";
  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`;
    } else {
      out += out ? `.${segment}` : segment;
    }
  }
  return out;
}
