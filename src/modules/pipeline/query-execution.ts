import type { CorrelationContext } from "../../observability/logger.js";
import { extract, type ExtractorDependencies } from "../extraction/extractor.js";
import { rerankCandidates, type RerankDependencies } from "../search/reranker.js";
import type { Retriever } from "../search/retriever.js";
import {
  RERANK_ALL,
  type ExtractionResult,
  type RetrievalCandidate,
  type SearchConfiguration,
  type StrategyDecision
} from "../search/types.js";
import type { SearchStage } from "./stage-plan.js";

export interface QueryExecutionInput {
  applicationId: string;
  query: string;
  config: SearchConfiguration;
  decision: StrategyDecision;
  signal?: AbortSignal;
  isCancelled?: () => boolean;
  context?: CorrelationContext;
}

export interface QueryExecutionHooks {
  /** Called before each stage; throws to stop the run. */
  enterStage: (stage: SearchStage) => void;
  onFullScanProgress?: (scanned: number, total: number) => void;
}

export interface QueryExecutionDependencies {
  retriever: Retriever;
  rerank?: RerankDependencies;
  extraction?: Omit<ExtractorDependencies, "retriever">;
}

export interface QueryExecutionOutcome {
  candidates: RetrievalCandidate[];
  reranked: boolean;
  extraction: ExtractionResult | null;
}

/**
 * How many candidates retrieval should hand over. With reranking on, the pool
 * must cover the rerank window; `"all"` means every chunk of the application.
 */
export const resolveCandidatePoolSize = async (
  config: Pick<SearchConfiguration, "search_limit" | "use_reranker" | "rerank_limit">,
  countChunks: () => Promise<number>
): Promise<number> => {
  if (!config.use_reranker) {
    return config.search_limit;
  }
  if (config.rerank_limit === RERANK_ALL) {
    return Math.max(config.search_limit, await countChunks());
  }
  return Math.max(config.search_limit, config.rerank_limit);
};

/** Retrieval, optional reranking and optional extraction for one query, in order. */
export const executeQuery = async (
  input: QueryExecutionInput,
  hooks: QueryExecutionHooks,
  dependencies: QueryExecutionDependencies
): Promise<QueryExecutionOutcome> => {
  const { config, decision } = input;
  const retriever = dependencies.retriever;

  hooks.enterStage(decision.method === "hybrid" ? "hybrid_search" : "vector_search");
  const poolSize = await resolveCandidatePoolSize(config, () => retriever.countChunks(input.applicationId));
  const retrieved = await retriever.retrieve({
    applicationId: input.applicationId,
    query: input.query,
    method: decision.method,
    limit: poolSize,
    weights: decision.weights,
    signal: input.signal,
    context: input.context
  });

  let candidates = retrieved.slice(0, config.search_limit);
  let reranked = false;
  if (config.use_reranker) {
    hooks.enterStage("reranking");
    const outcome = await rerankCandidates(
      {
        query: input.query,
        candidates: retrieved,
        rerankLimit: config.rerank_limit,
        topK: config.search_limit,
        signal: input.signal,
        context: input.context
      },
      dependencies.rerank
    );
    candidates = outcome.candidates;
    reranked = outcome.reranked;
  }

  let extraction: ExtractionResult | null = null;
  if (config.llm) {
    hooks.enterStage("llm_processing");
    extraction = await extract(
      {
        applicationId: input.applicationId,
        query: input.query,
        candidates,
        llm: config.llm,
        retrievalMethod: decision.method,
        useFullScan: config.use_full_scan,
        signal: input.signal,
        isCancelled: input.isCancelled,
        onFullScanProgress: hooks.onFullScanProgress,
        context: input.context
      },
      { ...dependencies.extraction, retriever }
    );
  }

  return { candidates, reranked, extraction };
};
