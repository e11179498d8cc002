import type { RetrievalMethod, SearchConfiguration } from "../search/types.js";

export type SearchStage =
  | "starting"
  | "initializing"
  | "vector_search"
  | "hybrid_search"
  | "reranking"
  | "llm_processing"
  | "finishing";

export type AnalysisStage = "starting" | "initializing" | "analyzing" | "finishing";

export interface PlannedStage<TStage extends string = string> {
  name: TStage;
  progress: number;
  message: string;
}

export const ANALYSIS_PROGRESS_START = 15;
export const ANALYSIS_PROGRESS_SPAN = 75;

const STAGE_DEFINITIONS: Record<SearchStage | AnalysisStage, Omit<PlannedStage, "name">> = {
  starting: { progress: 5, message: "Запуск задачи" },
  initializing: { progress: 10, message: "Подготовка параметров поиска" },
  vector_search: { progress: 30, message: "Выполнение векторного поиска" },
  hybrid_search: { progress: 30, message: "Выполнение гибридного поиска" },
  reranking: { progress: 60, message: "Выполнение ререйтинга" },
  llm_processing: { progress: 75, message: "Обработка результатов через LLM" },
  analyzing: { progress: ANALYSIS_PROGRESS_START, message: "Анализ параметров чек-листа" },
  finishing: { progress: 90, message: "Формирование результатов" }
};

const toPlanned = <TStage extends SearchStage | AnalysisStage>(name: TStage): PlannedStage<TStage> => ({
  name,
  ...STAGE_DEFINITIONS[name]
});

/**
 * Stage list for one search task, derived once from the configuration. Optional
 * stages are present only when their feature is switched on.
 */
export const planSearchStages = (
  method: RetrievalMethod,
  config: Pick<SearchConfiguration, "use_reranker" | "llm">
): PlannedStage<SearchStage>[] => {
  const stages: SearchStage[] = ["starting", "initializing", method === "hybrid" ? "hybrid_search" : "vector_search"];
  if (config.use_reranker) {
    stages.push("reranking");
  }
  if (config.llm) {
    stages.push("llm_processing");
  }
  stages.push("finishing");
  return stages.map(toPlanned);
};

export const planAnalysisStages = (): PlannedStage<AnalysisStage>[] => {
  const stages: AnalysisStage[] = ["starting", "initializing", "analyzing", "finishing"];
  return stages.map((name) =>
    name === "finishing" ? { ...toPlanned(name), progress: ANALYSIS_PROGRESS_START + ANALYSIS_PROGRESS_SPAN + 5 } : toPlanned(name)
  );
};

export const analysisProgress = (done: number, total: number): number =>
  total > 0 ? ANALYSIS_PROGRESS_START + Math.floor((ANALYSIS_PROGRESS_SPAN * done) / total) : ANALYSIS_PROGRESS_START;
