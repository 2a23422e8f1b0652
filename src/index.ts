// Config
export { getConfig, configure, resetConfig, defaults, loadProjectConfig, readProjectConfig } from "./config.js";
export type { MissionctlConfig, ModeDefaults } from "./config.js";

// Errors
export {
  OrchestratorError,
  ValidationError,
  ConfigError,
  TaskTimeoutError,
  TaskFailureError,
  TaskCancelledError,
  BlockedByDependencyError,
  IntegrationFailureError,
  VerificationFailureError,
  ReportWriteError,
  LifecycleError,
} from "./errors.js";
export type { ErrorCode, ErrorCause } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  TaskDefinitionSchema,
  PhaseDefinitionSchema,
  MissionHeaderSchema,
  ProjectConfigSchema,
  ActiveRunMarkerSchema,
} from "./schemas.js";
export type { TaskDefinition, PhaseDefinition, ProjectConfigFile, ActiveRunMarker } from "./schemas.js";

// Mission model
export { loadMission, parseMission } from "./mission/mission.js";
export type { ParseMissionOptions } from "./mission/mission.js";
export { normalizeWriteTarget, normalizeWriteTargets, isLogicalTarget } from "./mission/write-targets.js";
export { findCycles, topologicalOrder } from "./mission/task-graph.js";
export type {
  Mission,
  MissionMode,
  MissionTask,
  MissionPhase,
  TaskRunState,
  TaskResult,
  AttemptLog,
} from "./mission/types.js";

// Execution
export { LockManager } from "./executor/lock-manager.js";
export { ShellTaskRunner } from "./executor/task-runner.js";
export type { ShellTaskRunnerOptions } from "./executor/task-runner.js";
export { Scheduler } from "./executor/scheduler.js";
export { runPhases, deriveMissionStatus, failedOrBlocked } from "./executor/phases.js";
export type { MissionStatus, PhaseResults } from "./executor/phases.js";
export type { RunnableTask, TaskRunner, ScheduleOptions, ScheduleResult } from "./executor/types.js";

// Reports
export { buildReport, writeReport } from "./report/report.js";
export type { MissionReport, TaskResultJson } from "./report/report.js";

// Persistence
export { RunStore } from "./persistence/store.js";
export type { RunRecord } from "./persistence/store.js";

// Project and lifecycle
export { resolveLayout, initProject, defaultReportPath } from "./project/layout.js";
export type { ProjectLayout } from "./project/layout.js";
export { startBackgroundRun, cancelActiveRun, readActiveRun } from "./lifecycle/background.js";
export type { StartedRun, CancelOutcome, ActiveRun } from "./lifecycle/background.js";
export { runVerification } from "./lifecycle/verify.js";

// Core
export { Orchestrator } from "./orchestrator.js";
export type { OrchestratorOptions, RunOptions, RunCallbacks, MissionRun } from "./orchestrator.js";
export { buildProgram } from "./program.js";

// Utils
export { log, setLogLevel } from "./utils/logger.js";
export { withRetry } from "./utils/retry.js";
