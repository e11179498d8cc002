import { z } from "zod";
import { getOpenAIClient, type OpenAIGateway } from "../../clients/openai.js";
import { withRetries, withTimeout } from "../../clients/retry.js";
import { config } from "../../config/index.js";
import { logInfo, logWarn, serializeError, type CorrelationContext } from "../../observability/logger.js";
import { recordErrorRate, recordRerankLatency } from "../../observability/metrics.js";
import { RERANK_SYSTEM_PROMPT, buildRerankUserPrompt } from "../../prompts/index.js";
import { CancelledByUserError, RerankUnavailableError } from "./errors.js";
import { RERANK_ALL, type RerankLimit, type RetrievalCandidate } from "./types.js";

const RERANK_BATCH_SIZE = 8;

/** Scores passages against a query; result is aligned with `texts` by index. */
export interface RerankingService {
  score: (query: string, texts: string[], signal?: AbortSignal) => Promise<number[]>;
}

const rerankResponseSchema = z.object({
  scores: z.array(z.coerce.number())
});

export interface LlmRerankingDependencies {
  getGateway?: () => Promise<Pick<OpenAIGateway, "complete">>;
  model?: string;
  batchSize?: number;
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
}

const clampScore = (value: number): number => (Number.isFinite(value) ? Math.min(1, Math.max(0, value)) : 0);

/**
 * Cross-encoder stand-in backed by the chat model: each batch of passages is
 * scored in one JSON-mode completion.
 */
export const createLlmRerankingService = (dependencies?: LlmRerankingDependencies): RerankingService => {
  const getGateway = dependencies?.getGateway ?? getOpenAIClient;
  const model = dependencies?.model ?? config.LLM_RERANK_MODEL;
  const batchSize = Math.max(1, dependencies?.batchSize ?? RERANK_BATCH_SIZE);
  const timeoutMs = dependencies?.timeoutMs ?? config.LLM_TIMEOUT_MS;
  const retries = dependencies?.retries ?? config.EXTERNAL_CALL_RETRIES;
  const retryDelayMs = dependencies?.retryDelayMs ?? config.EXTERNAL_CALL_RETRY_DELAY_MS;

  const scoreBatch = async (
    gateway: Pick<OpenAIGateway, "complete">,
    query: string,
    texts: string[],
    signal?: AbortSignal
  ): Promise<number[]> => {
    const response = await withRetries(
      () =>
        withTimeout(
          (callSignal) =>
            gateway.complete({
              model,
              temperature: 0,
              jsonResponse: true,
              signal: callSignal,
              messages: [
                { role: "system", content: RERANK_SYSTEM_PROMPT },
                { role: "user", content: buildRerankUserPrompt({ query, texts }) }
              ]
            }),
          timeoutMs,
          signal
        ),
      { retries, delayMs: retryDelayMs, signal }
    );

    if (response.content.trim().length === 0) {
      throw new RerankUnavailableError("Reranker returned empty content.");
    }

    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(response.content);
    } catch (error) {
      const message = error instanceof Error ? error.message : "invalid json";
      throw new RerankUnavailableError(`Reranker returned invalid JSON: ${message}`);
    }

    const parsed = rerankResponseSchema.safeParse(parsedJson);
    if (!parsed.success) {
      throw new RerankUnavailableError("Reranker JSON schema validation failed.");
    }
    if (parsed.data.scores.length !== texts.length) {
      throw new RerankUnavailableError(
        `Reranker returned ${parsed.data.scores.length} scores for ${texts.length} passages.`
      );
    }

    return parsed.data.scores.map(clampScore);
  };

  return {
    async score(query, texts, signal) {
      const gateway = await getGateway();
      const scores: number[] = [];
      for (let start = 0; start < texts.length; start += batchSize) {
        const batch = texts.slice(start, start + batchSize);
        scores.push(...(await scoreBatch(gateway, query, batch, signal)));
      }
      return scores;
    }
  };
};

export interface RerankInput {
  query: string;
  candidates: RetrievalCandidate[];
  rerankLimit: RerankLimit;
  topK: number;
  signal?: AbortSignal;
  context?: CorrelationContext;
}

export interface RerankOutcome {
  candidates: RetrievalCandidate[];
  /** False when the scoring service failed and the input order was kept. */
  reranked: boolean;
  scoredCount: number;
}

export interface RerankDependencies {
  service?: RerankingService;
  now?: () => number;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
  recordRerankLatency?: typeof recordRerankLatency;
}

export const resolveRerankWindow = (rerankLimit: RerankLimit, candidateCount: number): number =>
  rerankLimit === RERANK_ALL ? candidateCount : Math.min(rerankLimit, candidateCount);

/**
 * Rescores the first `min(rerankLimit, n)` candidates and orders them by
 * `rerank_score` descending. Original scores are kept. A service failure is
 * logged and yields the input order with `rerank_score` left null.
 */
export const rerankCandidates = async (
  input: RerankInput,
  dependencies?: RerankDependencies
): Promise<RerankOutcome> => {
  const service = dependencies?.service ?? createLlmRerankingService();
  const now = dependencies?.now ?? Date.now;
  const info = dependencies?.logInfo ?? logInfo;
  const warn = dependencies?.logWarn ?? logWarn;
  const recordLatency = dependencies?.recordRerankLatency ?? recordRerankLatency;
  const context = input.context ?? {};
  const topK = Math.max(1, input.topK);

  const window = input.candidates.slice(0, resolveRerankWindow(input.rerankLimit, input.candidates.length));
  if (window.length === 0) {
    return { candidates: [], reranked: false, scoredCount: 0 };
  }

  const startedAt = now();
  let scores: number[];
  try {
    scores = await service.score(
      input.query,
      window.map((candidate) => candidate.text),
      input.signal
    );
    if (scores.length !== window.length) {
      throw new RerankUnavailableError(`Expected ${window.length} rerank scores, received ${scores.length}.`);
    }
  } catch (error) {
    if (input.signal?.aborted || error instanceof CancelledByUserError) {
      throw new CancelledByUserError();
    }
    recordErrorRate("rerank_unavailable");
    warn("search.rerank.fallback", context, {
      candidate_count: window.length,
      latency_ms: now() - startedAt,
      ...serializeError(error)
    });
    return {
      candidates: input.candidates.slice(0, topK).map((candidate) => ({ ...candidate, rerank_score: null })),
      reranked: false,
      scoredCount: 0
    };
  }

  const reranked = window
    .map((candidate, index) => ({ ...candidate, rerank_score: scores[index] }))
    .sort((a, b) => (b.rerank_score ?? 0) - (a.rerank_score ?? 0))
    .slice(0, topK);

  const latencyMs = now() - startedAt;
  recordLatency(latencyMs);
  info("search.rerank.complete", context, {
    candidate_count: window.length,
    selected_count: reranked.length,
    latency_ms: latencyMs,
    fallback_used: false
  });

  return { candidates: reranked, reranked: true, scoredCount: window.length };
};
