import { logInfo, type CorrelationContext } from "../../observability/logger.js";
import { recordRetrievalLatency } from "../../observability/metrics.js";
import { createChunkIndex, type ChunkHit, type ChunkIndex, type ChunkRecord } from "./chunk-index.js";
import { createEmbeddingService, type EmbeddingService } from "./embeddings.js";
import { CancelledByUserError } from "./errors.js";
import type { HybridWeights, RetrievalCandidate, RetrievalMethod, SearchType } from "./types.js";

/** Lexical-only hits whose normalized score falls under this floor are dropped. */
export const TEXT_MIN_RELEVANCE = 0.2;
const HYBRID_FETCH_MULTIPLIER = 2;

export interface RetrieveInput {
  applicationId: string;
  query: string;
  method: RetrievalMethod;
  limit: number;
  weights?: HybridWeights | null;
  signal?: AbortSignal;
  context?: CorrelationContext;
}

export interface Retriever {
  retrieve: (input: RetrieveInput) => Promise<RetrievalCandidate[]>;
  /** Every chunk of the application, unscored, in document order. */
  fullScan: (applicationId: string, context?: CorrelationContext) => Promise<RetrievalCandidate[]>;
  countChunks: (applicationId: string) => Promise<number>;
}

export interface RetrieverDependencies {
  now?: () => number;
  embeddings?: EmbeddingService;
  index?: ChunkIndex;
  recordRetrievalLatency?: typeof recordRetrievalLatency;
  logInfo?: typeof logInfo;
}

const toCandidate = (
  chunk: ChunkRecord,
  scores: Pick<RetrievalCandidate, "score" | "vector_score" | "text_score" | "search_type">
): RetrievalCandidate => ({
  ...chunk,
  ...scores,
  rerank_score: null
});

const maxScore = (hits: ChunkHit[]): number => hits.reduce((max, hit) => Math.max(max, hit.score), 0);

const normalize = (score: number, max: number): number => (max > 0 ? score / max : 0);

/**
 * Blends vector and lexical hits. Each set is normalized by its own maximum,
 * then `score = vector_weight * nv + text_weight * nt`. Sort is stable, so ties
 * keep vector order first and lexical order after it.
 */
export const combineHybridHits = (
  vectorHits: ChunkHit[],
  textHits: ChunkHit[],
  weights: HybridWeights,
  limit: number
): RetrievalCandidate[] => {
  const vectorMax = maxScore(vectorHits);
  const textMax = maxScore(textHits);

  const merged = new Map<string, { chunk: ChunkRecord; vector: number | null; text: number | null }>();
  for (const hit of vectorHits) {
    if (!merged.has(hit.chunk.chunk_id)) {
      merged.set(hit.chunk.chunk_id, { chunk: hit.chunk, vector: hit.score, text: null });
    }
  }
  for (const hit of textHits) {
    const existing = merged.get(hit.chunk.chunk_id);
    if (existing) {
      existing.text = existing.text ?? hit.score;
      continue;
    }
    merged.set(hit.chunk.chunk_id, { chunk: hit.chunk, vector: null, text: hit.score });
  }

  const candidates: RetrievalCandidate[] = [];
  for (const entry of merged.values()) {
    const nv = entry.vector === null ? 0 : normalize(entry.vector, vectorMax);
    const nt = entry.text === null ? 0 : normalize(entry.text, textMax);

    if (entry.vector === null && nt < TEXT_MIN_RELEVANCE) {
      continue;
    }

    const searchType: SearchType = entry.vector !== null && entry.text !== null ? "hybrid" : entry.vector !== null ? "vector" : "text";
    candidates.push(
      toCandidate(entry.chunk, {
        score: weights.vector_weight * nv + weights.text_weight * nt,
        vector_score: entry.vector,
        text_score: entry.text,
        search_type: searchType
      })
    );
  }

  return candidates.sort((a, b) => (b.score ?? 0) - (a.score ?? 0)).slice(0, limit);
};

export const createRetriever = (dependencies?: RetrieverDependencies): Retriever => {
  const now = dependencies?.now ?? Date.now;
  const embeddings = dependencies?.embeddings ?? createEmbeddingService();
  const index = dependencies?.index ?? createChunkIndex();
  const recordLatency = dependencies?.recordRetrievalLatency ?? recordRetrievalLatency;
  const log = dependencies?.logInfo ?? logInfo;

  const ensureNotCancelled = (signal?: AbortSignal): void => {
    if (signal?.aborted) {
      throw new CancelledByUserError();
    }
  };

  return {
    async retrieve(input) {
      const startedAt = now();
      const limit = Math.max(1, input.limit);

      const vector = await embeddings.embed(input.query, input.signal);
      ensureNotCancelled(input.signal);

      let candidates: RetrievalCandidate[];
      let textHitCount = 0;
      if (input.method === "hybrid") {
        const weights = input.weights ?? { vector_weight: 0.5, text_weight: 0.5 };
        const fetchK = limit * HYBRID_FETCH_MULTIPLIER;
        const vectorHits = await index.vectorSearch(input.applicationId, vector, fetchK);
        ensureNotCancelled(input.signal);
        const textHits = await index.textSearch(input.applicationId, input.query, fetchK);
        textHitCount = textHits.length;
        candidates = combineHybridHits(vectorHits, textHits, weights, limit);
      } else {
        const hits = await index.vectorSearch(input.applicationId, vector, limit);
        candidates = hits.map((hit) =>
          toCandidate(hit.chunk, {
            score: hit.score,
            vector_score: hit.score,
            text_score: null,
            search_type: "vector"
          })
        );
      }

      const latencyMs = now() - startedAt;
      recordLatency(latencyMs);
      log("search.retrieve.complete", input.context ?? {}, {
        method: input.method,
        limit,
        candidate_count: candidates.length,
        text_hit_count: textHitCount,
        latency_ms: latencyMs
      });

      return candidates;
    },

    async fullScan(applicationId, context) {
      const startedAt = now();
      const chunks = await index.listChunks(applicationId);
      const latencyMs = now() - startedAt;
      recordLatency(latencyMs);
      log("search.full_scan.loaded", context ?? {}, {
        chunk_count: chunks.length,
        latency_ms: latencyMs
      });
      return chunks.map((chunk) =>
        toCandidate(chunk, { score: null, vector_score: null, text_score: null, search_type: "vector" })
      );
    },

    async countChunks(applicationId) {
      return index.countChunks(applicationId);
    }
  };
};
