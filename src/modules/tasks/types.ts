import type { SearchResultPayload } from "../search/types.js";

export type TaskStatus = "pending" | "progress" | "success" | "error" | "cancelled";

export type TerminalStatus = Extract<TaskStatus, "success" | "error" | "cancelled">;

export type TaskKind = "search" | "analysis";

export interface ParameterFailure {
  parameter_id: string;
  name: string;
  message: string;
}

export interface AnalysisResultPayload {
  kind: "analysis";
  application_id: string;
  checklist_id: string;
  processed: number;
  errors: number;
  total: number;
  outcome: "analyzed" | "analysis_partial";
  failures: ParameterFailure[];
}

export type TaskResult = SearchResultPayload | AnalysisResultPayload;

export interface TaskRecord {
  id: string;
  kind: TaskKind;
  application_id: string;
  status: TaskStatus;
  stage: string;
  progress: number;
  message: string;
  /** Stage plan fixed at creation; the UI renders it as the step list. */
  stages: string[];
  created_at: number;
  updated_at: number;
  last_polled_at: number | null;
  finished_at: number | null;
  cancel_requested: boolean;
  result: TaskResult | null;
}

export interface StageUpdate {
  stage: string;
  progress: number;
  message: string;
}

export interface TerminalUpdate {
  status: TerminalStatus;
  message: string;
  result?: TaskResult | null;
}

export const isTerminalStatus = (status: TaskStatus): status is TerminalStatus =>
  status === "success" || status === "error" || status === "cancelled";
