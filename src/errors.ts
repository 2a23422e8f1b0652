export type ErrorCode =
  | "VALIDATION_FAILED"
  | "CONFIG_INVALID"
  | "TASK_TIMEOUT"
  | "TASK_FAILURE"
  | "TASK_CANCELLED"
  | "BLOCKED_BY_DEPENDENCY"
  | "INTEGRATION_FAILURE"
  | "VERIFICATION_FAILURE"
  | "REPORT_WRITE_FAILED"
  | "SCHEDULER_STALLED"
  | "RUN_ALREADY_ACTIVE"
  | "SPAWN_FAILED";

/** Serializable failure cause recorded on task results and reports. */
export type ErrorCause = {
  code: ErrorCode;
  message: string;
};

export class OrchestratorError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OrchestratorError";
    this.code = code;
  }

  toCause(): ErrorCause {
    return { code: this.code, message: this.message };
  }
}

/**
 * A mission (or config) rejected before anything ran. `issues` lists every
 * problem found, not just the first.
 */
export class ValidationError extends OrchestratorError {
  readonly issues: string[];

  constructor(issues: string[], message?: string) {
    super("VALIDATION_FAILED", message ?? formatIssues(issues));
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class ConfigError extends OrchestratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_INVALID", message, options);
    this.name = "ConfigError";
  }
}

export class TaskTimeoutError extends OrchestratorError {
  constructor(readonly taskId: string, readonly timeoutSec: number) {
    super("TASK_TIMEOUT", `timed out after ${timeoutSec}s`);
    this.name = "TaskTimeoutError";
  }
}

export class TaskFailureError extends OrchestratorError {
  constructor(readonly taskId: string, readonly exitCode: number, readonly attempts: number) {
    super(
      "TASK_FAILURE",
      `exited with code ${exitCode} after ${attempts} attempt${attempts === 1 ? "" : "s"}`,
    );
    this.name = "TaskFailureError";
  }
}

export class TaskCancelledError extends OrchestratorError {
  constructor(readonly taskId: string) {
    super("TASK_CANCELLED", "cancelled before completion");
    this.name = "TaskCancelledError";
  }
}

export class BlockedByDependencyError extends OrchestratorError {
  constructor(readonly taskId: string, readonly dependencies: string[]) {
    super("BLOCKED_BY_DEPENDENCY", `blocked by failed dependency: ${dependencies.join(", ")}`);
    this.name = "BlockedByDependencyError";
  }
}

export class IntegrationFailureError extends OrchestratorError {
  constructor(detail: string) {
    super("INTEGRATION_FAILURE", `integrate failed: ${detail}`);
    this.name = "IntegrationFailureError";
  }
}

export class VerificationFailureError extends OrchestratorError {
  constructor(detail: string) {
    super("VERIFICATION_FAILURE", `verify failed: ${detail}`);
    this.name = "VerificationFailureError";
  }
}

export class ReportWriteError extends OrchestratorError {
  constructor(readonly path: string, cause: unknown) {
    super("REPORT_WRITE_FAILED", `Failed to write report to ${path}: ${errorMessage(cause)}`, {
      cause,
    });
    this.name = "ReportWriteError";
  }
}

export class LifecycleError extends OrchestratorError {
  constructor(code: "RUN_ALREADY_ACTIVE" | "SPAWN_FAILED", message: string) {
    super(code, message);
    this.name = "LifecycleError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function formatIssues(issues: string[]): string {
  if (issues.length === 1) return `Invalid mission: ${issues[0]}`;
  return `Invalid mission (${issues.length} issues):\n${issues.map((i) => `  - ${i}`).join("\n")}`;
}
