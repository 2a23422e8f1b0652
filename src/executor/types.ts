import type { Mission, MissionTask, TaskResult, TaskRunState } from "../mission/types.js";

/** What the runner needs to know about a task or phase command. */
export type RunnableTask = {
  id: string;
  command: string;
  timeoutSec?: number;
  retries: number;
};

export interface TaskRunner {
  /** Run every attempt of `task`. Never rejects for task-level failures. */
  run(task: RunnableTask, signal: AbortSignal): Promise<TaskResult>;
}

export type ScheduleOptions = {
  signal?: AbortSignal;
  onTaskStart?: (task: MissionTask) => void;
  onTaskEnd?: (task: MissionTask, result: TaskResult) => void;
  onTaskBlocked?: (task: MissionTask, failedDeps: string[]) => void;
};

export type ScheduleResult = {
  mission: Mission;
  /** Results keyed by task id, in declaration order. */
  results: Record<string, TaskResult>;
  states: Record<string, TaskRunState>;
  cancelled: boolean;
};
