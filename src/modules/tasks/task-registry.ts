import { randomUUID } from "node:crypto";
import { config } from "../../config/index.js";
import { logDebug, logInfo } from "../../observability/logger.js";
import {
  isTerminalStatus,
  type StageUpdate,
  type TaskKind,
  type TaskRecord,
  type TerminalUpdate
} from "./types.js";

export const INITIAL_STAGE = "pending";

export interface CreateTaskInput {
  kind: TaskKind;
  applicationId: string;
  stages: string[];
  message?: string;
}

/**
 * Task state shared between request handlers and workers. The in-memory
 * implementation below serves one process; a multi-process deployment swaps
 * in a store backed by a shared cache with the same contract.
 */
export interface TaskStore {
  create: (input: CreateTaskInput) => TaskRecord;
  get: (taskId: string) => TaskRecord | null;
  /** Reads a task on behalf of a polling client, extending its retention. */
  poll: (taskId: string) => TaskRecord | null;
  advance: (taskId: string, update: StageUpdate) => boolean;
  finish: (taskId: string, update: TerminalUpdate) => boolean;
  requestCancel: (taskId: string) => TaskRecord | null;
  isCancelRequested: (taskId: string) => boolean;
  sweep: () => number;
}

export interface TaskRegistryOptions {
  now?: () => number;
  retentionMs?: number;
  generateId?: () => string;
}

const snapshot = (record: TaskRecord): TaskRecord => ({ ...record, stages: [...record.stages] });

export class TaskRegistry implements TaskStore {
  private readonly tasks = new Map<string, TaskRecord>();
  private readonly now: () => number;
  private readonly retentionMs: number;
  private readonly generateId: () => string;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: TaskRegistryOptions = {}) {
    this.now = options.now ?? Date.now;
    this.retentionMs = options.retentionMs ?? config.TASK_RETENTION_MS;
    this.generateId = options.generateId ?? randomUUID;
  }

  get size(): number {
    return this.tasks.size;
  }

  create(input: CreateTaskInput): TaskRecord {
    const createdAt = this.now();
    const record: TaskRecord = {
      id: this.generateId(),
      kind: input.kind,
      application_id: input.applicationId,
      status: "pending",
      stage: INITIAL_STAGE,
      progress: 0,
      message: input.message ?? "Задача поставлена в очередь",
      stages: [...input.stages],
      created_at: createdAt,
      updated_at: createdAt,
      last_polled_at: null,
      finished_at: null,
      cancel_requested: false,
      result: null
    };
    this.tasks.set(record.id, record);
    logDebug("task.created", { taskId: record.id, applicationId: input.applicationId }, {
      kind: input.kind,
      stages: record.stages
    });
    return snapshot(record);
  }

  get(taskId: string): TaskRecord | null {
    const record = this.tasks.get(taskId);
    return record ? snapshot(record) : null;
  }

  poll(taskId: string): TaskRecord | null {
    const record = this.tasks.get(taskId);
    if (!record) {
      return null;
    }
    record.last_polled_at = this.now();
    return snapshot(record);
  }

  /**
   * Moves a running task to `update.stage`. Stages only move forward through
   * the plan and progress never decreases; writes after a terminal state, to
   * unknown stages or to earlier stages are rejected.
   */
  advance(taskId: string, update: StageUpdate): boolean {
    const record = this.tasks.get(taskId);
    if (!record || isTerminalStatus(record.status)) {
      return false;
    }

    const targetIndex = record.stages.indexOf(update.stage);
    if (targetIndex < 0) {
      return false;
    }
    const currentIndex = record.stages.indexOf(record.stage);
    if (targetIndex < currentIndex) {
      return false;
    }

    record.status = "progress";
    record.stage = update.stage;
    record.progress = Math.min(100, Math.max(record.progress, Math.round(update.progress)));
    record.message = update.message;
    record.updated_at = this.now();
    return true;
  }

  /** Writes the terminal state once; later calls are ignored. */
  finish(taskId: string, update: TerminalUpdate): boolean {
    const record = this.tasks.get(taskId);
    if (!record || isTerminalStatus(record.status)) {
      return false;
    }

    const finishedAt = this.now();
    record.status = update.status;
    record.stage = update.status;
    record.progress = update.status === "success" ? 100 : record.progress;
    record.message = update.message;
    record.result = update.status === "success" ? update.result ?? null : null;
    record.updated_at = finishedAt;
    record.finished_at = finishedAt;
    return true;
  }

  requestCancel(taskId: string): TaskRecord | null {
    const record = this.tasks.get(taskId);
    if (!record) {
      return null;
    }
    if (!record.cancel_requested && !isTerminalStatus(record.status)) {
      record.cancel_requested = true;
      record.updated_at = this.now();
      logInfo("task.cancel.requested", { taskId, applicationId: record.application_id }, { stage: record.stage });
    }
    return snapshot(record);
  }

  isCancelRequested(taskId: string): boolean {
    return this.tasks.get(taskId)?.cancel_requested ?? false;
  }

  /** Drops finished tasks nobody has touched within the retention window. */
  sweep(): number {
    const cutoff = this.now() - this.retentionMs;
    let evicted = 0;
    for (const [taskId, record] of this.tasks) {
      if (!isTerminalStatus(record.status)) {
        continue;
      }
      const lastActivity = Math.max(record.updated_at, record.last_polled_at ?? 0);
      if (lastActivity <= cutoff) {
        this.tasks.delete(taskId);
        evicted += 1;
      }
    }
    if (evicted > 0) {
      logDebug("task.sweep.evicted", {}, { evicted, remaining: this.tasks.size });
    }
    return evicted;
  }

  startSweeper(intervalMs: number = config.TASK_SWEEP_INTERVAL_MS): void {
    if (this.sweepTimer) {
      return;
    }
    this.sweepTimer = setInterval(() => {
      this.sweep();
    }, intervalMs);
    this.sweepTimer.unref();
  }

  stopSweeper(): void {
    if (!this.sweepTimer) {
      return;
    }
    clearInterval(this.sweepTimer);
    this.sweepTimer = null;
  }
}
