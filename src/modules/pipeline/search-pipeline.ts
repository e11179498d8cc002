import pLimit from "p-limit";
import { config } from "../../config/index.js";
import {
  logDebug,
  logError,
  logInfo,
  logTrace,
  logWarn,
  serializeError,
  type CorrelationContext
} from "../../observability/logger.js";
import { recordErrorRate, recordTaskOutcome } from "../../observability/metrics.js";
import { DEFAULT_EXTRACTION_PROMPT_TEMPLATE } from "../../prompts/index.js";
import { ChecklistRepository, type ChecklistParameterRecord, type ChecklistRepositoryPort } from "../checklists/checklist-repository.js";
import { toParameterConfiguration } from "../checklists/parameter-config.js";
import {
  ParameterResultRepository,
  type ParameterResultRepositoryPort
} from "../checklists/parameter-result-repository.js";
import { createLlmService, type LlmService } from "../llm/llm-service.js";
import { CancelledByUserError, ValidationError, toSafeUserErrorMessage } from "../search/errors.js";
import type { RerankingService } from "../search/reranker.js";
import { createRetriever, type Retriever } from "../search/retriever.js";
import {
  parseSearchConfiguration,
  validateQuery,
  type SearchConfigurationDefaults
} from "../search/search-config.js";
import { selectStrategy } from "../search/strategy-selector.js";
import type { SearchConfiguration, SearchResultPayload, StrategyDecision } from "../search/types.js";
import { toStatusPayload, type TaskStatusPayload } from "../tasks/status-payload.js";
import { TaskRegistry, type TaskStore } from "../tasks/task-registry.js";
import type { AnalysisResultPayload, ParameterFailure, TaskKind, TaskStatus } from "../tasks/types.js";
import { executeQuery, type QueryExecutionDependencies } from "./query-execution.js";
import {
  analysisProgress,
  planAnalysisStages,
  planSearchStages,
  type AnalysisStage,
  type PlannedStage,
  type SearchStage
} from "./stage-plan.js";

export class TaskNotFoundError extends Error {
  constructor(taskId: string) {
    super(`Task ${taskId} not found`);
    this.name = "TaskNotFoundError";
  }
}

export interface SubmitSearchInput {
  applicationId: string;
  query: unknown;
  options?: unknown;
}

export interface SubmitAnalysisInput {
  applicationId: string;
  checklistId: string;
}

export interface CancelAcknowledgement {
  task_id: string;
  cancel_requested: boolean;
  status: TaskStatus;
}

export interface SearchPipelineDependencies {
  registry?: TaskStore;
  retriever?: Retriever;
  reranking?: RerankingService;
  llm?: LlmService;
  checklists?: ChecklistRepositoryPort;
  results?: ParameterResultRepositoryPort;
  concurrency?: number;
  fullScanBatchSize?: number;
  defaults?: SearchConfigurationDefaults;
  now?: () => number;
}

interface TaskRun {
  taskId: string;
  kind: TaskKind;
  controller: AbortController;
  context: CorrelationContext;
  startedAt: number;
}

const LLM_STAGE_PROGRESS_SPAN = 15;
const ALL_PARAMETERS_FAILED_MESSAGE = "Не удалось обработать ни один параметр чек-листа.";

/**
 * Accepts search and analysis requests, runs each as one task on a bounded
 * worker pool and drives the task through its stage plan in the registry.
 * Only the worker that owns a task writes its stage, progress and terminal
 * state.
 */
export class SearchPipeline {
  readonly registry: TaskStore;
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly controllers = new Map<string, AbortController>();
  private readonly inflight = new Set<Promise<void>>();
  private readonly dependencies: SearchPipelineDependencies;
  private readonly defaults: SearchConfigurationDefaults;
  private readonly now: () => number;
  private retrieverInstance: Retriever | null = null;
  private llmInstance: LlmService | null = null;

  constructor(dependencies: SearchPipelineDependencies = {}) {
    this.dependencies = dependencies;
    this.registry = dependencies.registry ?? new TaskRegistry();
    this.limit = pLimit(Math.max(1, dependencies.concurrency ?? config.PIPELINE_CONCURRENCY));
    this.defaults = dependencies.defaults ?? {
      model: config.LLM_DEFAULT_MODEL,
      promptTemplate: DEFAULT_EXTRACTION_PROMPT_TEMPLATE
    };
    this.now = dependencies.now ?? Date.now;
  }

  /** Validates synchronously; a rejected request never creates a task. */
  submitSearch(input: SubmitSearchInput): string {
    const applicationId = validateApplicationId(input.applicationId);
    const query = validateQuery(input.query);
    const searchConfig = parseSearchConfiguration(input.options, this.defaults);
    const decision = selectStrategy(query, searchConfig);
    const plan = planSearchStages(decision.method, searchConfig);

    const task = this.registry.create({
      kind: "search",
      applicationId,
      stages: plan.map((stage) => stage.name)
    });
    logInfo("pipeline.search.submitted", { taskId: task.id, applicationId }, {
      method: decision.method,
      stages: task.stages,
      use_reranker: searchConfig.use_reranker,
      use_full_scan: searchConfig.use_full_scan,
      llm_enabled: searchConfig.llm !== null
    });

    this.schedule(task.id, "search", applicationId, (run) =>
      this.runSearch(run, { applicationId, query, searchConfig, decision, plan })
    );
    return task.id;
  }

  async submitAnalysis(input: SubmitAnalysisInput): Promise<string> {
    const applicationId = validateApplicationId(input.applicationId);
    const checklistId = input.checklistId.trim();
    if (checklistId.length === 0) {
      throw new ValidationError([{ type: "value_error", loc: ["checklist_id"], msg: "checklist_id must be a non-empty string" }]);
    }

    const checklist = await this.checklists().getChecklistWithParameters(checklistId);
    if (!checklist) {
      throw new ValidationError([{ type: "not_found", loc: ["checklist_id"], msg: `checklist ${checklistId} not found` }]);
    }
    if (checklist.parameters.length === 0) {
      throw new ValidationError([{ type: "value_error", loc: ["checklist_id"], msg: `checklist ${checklistId} has no parameters` }]);
    }

    const plan = planAnalysisStages();
    const task = this.registry.create({
      kind: "analysis",
      applicationId,
      stages: plan.map((stage) => stage.name)
    });
    logInfo("pipeline.analysis.submitted", { taskId: task.id, applicationId }, {
      checklist_id: checklist.id,
      parameter_count: checklist.parameters.length
    });

    this.schedule(task.id, "analysis", applicationId, (run) =>
      this.runAnalysis(run, { applicationId, checklistId: checklist.id, parameters: checklist.parameters, plan })
    );
    return task.id;
  }

  getStatus(taskId: string): TaskStatusPayload {
    const task = this.registry.poll(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    return toStatusPayload(task);
  }

  /** Sets the cancellation flag and aborts the in-flight call if one is running. */
  cancel(taskId: string): CancelAcknowledgement {
    const task = this.registry.requestCancel(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    this.controllers.get(taskId)?.abort();
    return { task_id: taskId, cancel_requested: task.cancel_requested, status: task.status };
  }

  /** Resolves once every scheduled task has reached a terminal state. */
  async whenIdle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight]);
    }
  }

  get activeCount(): number {
    return this.inflight.size;
  }

  private schedule(
    taskId: string,
    kind: TaskKind,
    applicationId: string,
    body: (run: TaskRun) => Promise<void>
  ): void {
    const controller = new AbortController();
    this.controllers.set(taskId, controller);
    const context: CorrelationContext = { taskId, applicationId };

    const job = this.limit(() =>
      this.execute({ taskId, kind, controller, context, startedAt: this.now() }, body)
    )
      .catch((error: unknown) => {
        logError("pipeline.worker.crashed", context, serializeError(error));
      })
      .finally(() => {
        this.controllers.delete(taskId);
        this.inflight.delete(job);
      });
    this.inflight.add(job);
  }

  private async execute(run: TaskRun, body: (run: TaskRun) => Promise<void>): Promise<void> {
    try {
      await body(run);
    } catch (error) {
      if (error instanceof CancelledByUserError || this.registry.isCancelRequested(run.taskId)) {
        this.finishTask(run, "cancelled", toSafeUserErrorMessage(new CancelledByUserError()));
      } else {
        recordErrorRate(`task_${run.kind}_failed`);
        logError("pipeline.task.failed", run.context, { kind: run.kind, ...serializeError(error) });
        this.finishTask(run, "error", toSafeUserErrorMessage(error));
      }
    } finally {
      const task = this.registry.get(run.taskId);
      if (task && task.status !== "success" && task.status !== "error" && task.status !== "cancelled") {
        logWarn("pipeline.task.unterminated", run.context, { stage: task.stage });
        this.finishTask(run, "error", toSafeUserErrorMessage(null));
      }
    }
  }

  private finishTask(
    run: TaskRun,
    status: "success" | "error" | "cancelled",
    message: string,
    result?: SearchResultPayload | AnalysisResultPayload
  ): void {
    if (!this.registry.finish(run.taskId, { status, message, result })) {
      return;
    }
    const durationMs = this.now() - run.startedAt;
    recordTaskOutcome(status, durationMs);
    logInfo("pipeline.task.finished", run.context, { kind: run.kind, status, duration_ms: durationMs });
  }

  /** Cancellation guard plus the stage-entry write. */
  private enterStage<TStage extends string>(run: TaskRun, plan: PlannedStage<TStage>[], stage: TStage): void {
    this.ensureNotCancelled(run);
    const planned = plan.find((entry) => entry.name === stage);
    if (!planned) {
      return;
    }
    this.registry.advance(run.taskId, { stage, progress: planned.progress, message: planned.message });
    logTrace("pipeline.stage.enter", run.context, { stage, progress: planned.progress });
  }

  private ensureNotCancelled(run: TaskRun): void {
    if (run.controller.signal.aborted || this.registry.isCancelRequested(run.taskId)) {
      throw new CancelledByUserError();
    }
  }

  private async runSearch(
    run: TaskRun,
    input: {
      applicationId: string;
      query: string;
      searchConfig: SearchConfiguration;
      decision: StrategyDecision;
      plan: PlannedStage<SearchStage>[];
    }
  ): Promise<void> {
    const { plan } = input;
    this.enterStage(run, plan, "starting");
    this.enterStage(run, plan, "initializing");

    const llmStage = plan.find((stage) => stage.name === "llm_processing");
    const outcome = await executeQuery(
      {
        applicationId: input.applicationId,
        query: input.query,
        config: input.searchConfig,
        decision: input.decision,
        signal: run.controller.signal,
        isCancelled: () => this.registry.isCancelRequested(run.taskId),
        context: run.context
      },
      {
        enterStage: (stage) => this.enterStage(run, plan, stage),
        onFullScanProgress: (scanned, total) => {
          if (!llmStage || total === 0) {
            return;
          }
          this.registry.advance(run.taskId, {
            stage: llmStage.name,
            progress: llmStage.progress + Math.floor((LLM_STAGE_PROGRESS_SPAN * scanned) / total),
            message: `Полное сканирование документа: ${scanned} из ${total}`
          });
        }
      },
      this.queryDependencies()
    );

    this.enterStage(run, plan, "finishing");
    const result: SearchResultPayload = {
      kind: "search",
      application_id: input.applicationId,
      query: input.query,
      method: input.decision.method,
      reranked: outcome.reranked,
      candidates: outcome.candidates,
      extraction: outcome.extraction
    };
    this.ensureNotCancelled(run);
    this.finishTask(run, "success", "Поиск завершен", result);
  }

  private async runAnalysis(
    run: TaskRun,
    input: {
      applicationId: string;
      checklistId: string;
      parameters: ChecklistParameterRecord[];
      plan: PlannedStage<AnalysisStage>[];
    }
  ): Promise<void> {
    const { plan, parameters } = input;
    const results = this.results();
    const total = parameters.length;
    this.enterStage(run, plan, "starting");
    this.enterStage(run, plan, "initializing");
    this.enterStage(run, plan, "analyzing");

    let processed = 0;
    const failures: ParameterFailure[] = [];
    for (const [index, parameter] of parameters.entries()) {
      this.ensureNotCancelled(run);
      try {
        const parameterConfig = toParameterConfiguration(parameter, this.defaults);
        const query = validateQuery(parameter.searchQuery);
        const outcome = await executeQuery(
          {
            applicationId: input.applicationId,
            query,
            config: parameterConfig,
            decision: selectStrategy(query, parameterConfig),
            signal: run.controller.signal,
            isCancelled: () => this.registry.isCancelRequested(run.taskId),
            context: run.context
          },
          { enterStage: () => this.ensureNotCancelled(run) },
          this.queryDependencies()
        );

        // A cancelled run persists nothing from the in-flight parameter.
        this.ensureNotCancelled(run);
        const extraction = outcome.extraction;
        await results.upsert({
          applicationId: input.applicationId,
          parameterId: parameter.id,
          status: "ok",
          value: extraction?.value ?? null,
          confidence: extraction?.confidence ?? null,
          method: extraction?.method ?? null,
          chunksScanned: extraction?.chunks_scanned ?? null,
          searchResults: extraction?.source_candidates ?? outcome.candidates,
          llmRequest: extraction?.llm_request ?? null,
          error: null
        });
        processed += 1;
        logDebug("pipeline.analysis.parameter.done", run.context, {
          parameter_id: parameter.id,
          method: extraction?.method ?? null,
          confidence: extraction?.confidence ?? null
        });
      } catch (error) {
        if (error instanceof CancelledByUserError || this.registry.isCancelRequested(run.taskId)) {
          throw new CancelledByUserError();
        }
        const message = toSafeUserErrorMessage(error);
        failures.push({ parameter_id: parameter.id, name: parameter.name, message });
        recordErrorRate("analysis_parameter_failed");
        logWarn("pipeline.analysis.parameter.failed", run.context, {
          parameter_id: parameter.id,
          ...serializeError(error)
        });
        await this.recordParameterFailure(results, input.applicationId, parameter.id, message, run.context);
      }

      const done = index + 1;
      this.registry.advance(run.taskId, {
        stage: "analyzing",
        progress: analysisProgress(done, total),
        message: `Обработано параметров: ${done} из ${total}`
      });
    }

    this.enterStage(run, plan, "finishing");
    if (processed === 0) {
      this.finishTask(run, "error", ALL_PARAMETERS_FAILED_MESSAGE);
      return;
    }

    const result: AnalysisResultPayload = {
      kind: "analysis",
      application_id: input.applicationId,
      checklist_id: input.checklistId,
      processed,
      errors: failures.length,
      total,
      outcome: failures.length === 0 ? "analyzed" : "analysis_partial",
      failures
    };
    this.ensureNotCancelled(run);
    this.finishTask(run, "success", `Анализ завершен: ${processed} из ${total}`, result);
  }

  private async recordParameterFailure(
    results: ParameterResultRepositoryPort,
    applicationId: string,
    parameterId: string,
    message: string,
    context: CorrelationContext
  ): Promise<void> {
    try {
      await results.upsert({
        applicationId,
        parameterId,
        status: "failed",
        value: null,
        confidence: null,
        method: null,
        chunksScanned: null,
        searchResults: [],
        llmRequest: null,
        error: message
      });
    } catch (error) {
      logError("pipeline.analysis.failure_record.failed", context, {
        parameter_id: parameterId,
        ...serializeError(error)
      });
    }
  }

  private queryDependencies(): QueryExecutionDependencies {
    return {
      retriever: this.retriever(),
      rerank: this.dependencies.reranking ? { service: this.dependencies.reranking } : undefined,
      extraction: {
        llm: this.llm(),
        fullScanBatchSize: this.dependencies.fullScanBatchSize
      }
    };
  }

  private retriever(): Retriever {
    this.retrieverInstance ??= this.dependencies.retriever ?? createRetriever();
    return this.retrieverInstance;
  }

  private llm(): LlmService {
    this.llmInstance ??= this.dependencies.llm ?? createLlmService();
    return this.llmInstance;
  }

  private checklists(): ChecklistRepositoryPort {
    return this.dependencies.checklists ?? new ChecklistRepository();
  }

  private results(): ParameterResultRepositoryPort {
    return this.dependencies.results ?? new ParameterResultRepository();
  }
}

const validateApplicationId = (applicationId: unknown): string => {
  if (typeof applicationId !== "string" || applicationId.trim().length === 0) {
    throw new ValidationError([
      { type: "value_error", loc: ["application_id"], msg: "application_id must be a non-empty string" }
    ]);
  }
  return applicationId.trim();
};
