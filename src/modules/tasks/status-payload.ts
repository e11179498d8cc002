import type { TaskRecord, TaskResult, TaskStatus } from "./types.js";

/** The polling contract. `result` is present only once status is `success`. */
export interface TaskStatusPayload {
  task_id: string;
  kind: TaskRecord["kind"];
  status: TaskStatus;
  stage: string;
  progress: number;
  message: string;
  stages: string[];
  cancel_requested: boolean;
  created_at: string;
  updated_at: string;
  result?: TaskResult;
}

export const toStatusPayload = (task: TaskRecord): TaskStatusPayload => {
  const payload: TaskStatusPayload = {
    task_id: task.id,
    kind: task.kind,
    status: task.status,
    stage: task.stage,
    progress: task.progress,
    message: task.message,
    stages: task.stages,
    cancel_requested: task.cancel_requested,
    created_at: new Date(task.created_at).toISOString(),
    updated_at: new Date(task.updated_at).toISOString()
  };
  if (task.status === "success" && task.result) {
    payload.result = task.result;
  }
  return payload;
};
