export type RetrievalMethod = "vector" | "hybrid";

export type ExtractionMethod = RetrievalMethod | "full_scan";

export type SearchType = "vector" | "text" | "hybrid";

export const RERANK_ALL = "all";

export type RerankLimit = number | typeof RERANK_ALL;

/** A retrieved chunk with its provenance and every score it has collected. */
export interface RetrievalCandidate {
  chunk_id: string;
  document_id: string;
  chunk_index: number | null;
  page_number: number | null;
  section: string | null;
  content_type: string | null;
  text: string;
  /** Blended ranking score from retrieval; null for unscored full-scan chunks. */
  score: number | null;
  vector_score: number | null;
  text_score: number | null;
  rerank_score: number | null;
  search_type: SearchType;
}

export interface HybridWeights {
  vector_weight: number;
  text_weight: number;
}

export interface StrategyDecision {
  method: RetrievalMethod;
  weights: HybridWeights | null;
}

export interface LlmOptions {
  model: string;
  temperature: number;
  max_tokens: number;
  prompt_template: string;
  /** Replaces the search query inside the prompt when set. */
  llm_query: string | null;
}

export interface SearchConfiguration {
  search_limit: number;
  use_reranker: boolean;
  rerank_limit: RerankLimit;
  use_smart_search: boolean;
  vector_weight: number;
  text_weight: number;
  hybrid_threshold: number;
  use_full_scan: boolean;
  /** LLM post-processing; the llm_processing stage runs only when this is set. */
  llm: LlmOptions | null;
}

export interface LlmRequestRecord {
  prompt_template: string;
  query: string;
  context: string;
  full_prompt: string;
  model: string;
  temperature: number;
  max_tokens: number;
  search_method: ExtractionMethod;
  context_length: number | null;
  response: string;
}

export interface ExtractionResult {
  value: string;
  confidence: number;
  source_candidates: RetrievalCandidate[];
  method: ExtractionMethod;
  chunks_scanned: number | null;
  format: string;
  llm_request: LlmRequestRecord | null;
}

export interface SearchResultPayload {
  kind: "search";
  application_id: string;
  query: string;
  method: RetrievalMethod;
  reranked: boolean;
  candidates: RetrievalCandidate[];
  extraction: ExtractionResult | null;
}

export const NOT_FOUND_VALUE = "Информация не найдена";
