import { config } from "../../config/index.js";
import { logInfo, logWarn, serializeError, type CorrelationContext } from "../../observability/logger.js";
import { createLlmService, type LlmService } from "../llm/llm-service.js";
import { CancelledByUserError } from "../search/errors.js";
import { createRetriever, type Retriever } from "../search/retriever.js";
import {
  NOT_FOUND_VALUE,
  type ExtractionMethod,
  type ExtractionResult,
  type LlmOptions,
  type LlmRequestRecord,
  type RetrievalCandidate,
  type RetrievalMethod
} from "../search/types.js";
import { DEFAULT_CONTEXT_TOKENS, formatContext } from "./context-formatter.js";
import { parseLlmResponse, type ParsedLlmResponse } from "./response-parser.js";

export interface ExtractInput {
  applicationId: string;
  query: string;
  candidates: RetrievalCandidate[];
  llm: LlmOptions;
  retrievalMethod: RetrievalMethod;
  useFullScan: boolean;
  signal?: AbortSignal;
  isCancelled?: () => boolean;
  onFullScanProgress?: (scanned: number, total: number) => void;
  context?: CorrelationContext;
}

export interface ExtractorDependencies {
  llm?: LlmService;
  retriever?: Pick<Retriever, "fullScan">;
  fullScanBatchSize?: number;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
}

interface Attempt {
  parsed: ParsedLlmResponse;
  request: LlmRequestRecord;
}

export const fillPromptTemplate = (template: string, query: string, context: string): string =>
  template.replaceAll("{query}", () => query).replaceAll("{context}", () => context);

const notFoundRecord = (
  input: ExtractInput,
  promptQuery: string,
  method: ExtractionMethod,
  contextLength: number | null
): LlmRequestRecord => ({
  prompt_template: input.llm.prompt_template,
  query: promptQuery,
  context: "",
  full_prompt: "",
  model: input.llm.model,
  temperature: input.llm.temperature,
  max_tokens: input.llm.max_tokens,
  search_method: method,
  context_length: contextLength,
  response: ""
});

/**
 * Runs the LLM over retrieved candidates and parses a value out of the answer.
 * A "not found" answer with full scan enabled falls back to walking every
 * chunk of the application in batches until one yields a value.
 */
export const extract = async (
  input: ExtractInput,
  dependencies?: ExtractorDependencies
): Promise<ExtractionResult> => {
  const llm = dependencies?.llm ?? createLlmService();
  const batchSize = Math.max(1, dependencies?.fullScanBatchSize ?? config.FULL_SCAN_BATCH_SIZE);
  const info = dependencies?.logInfo ?? logInfo;
  const warn = dependencies?.logWarn ?? logWarn;
  const context = input.context ?? {};
  const promptQuery = input.llm.llm_query ?? input.query;

  const ensureNotCancelled = (): void => {
    if (input.signal?.aborted || input.isCancelled?.()) {
      throw new CancelledByUserError();
    }
  };

  let contextLength: number | null = null;
  try {
    contextLength = (await llm.modelInfo(input.llm.model)).context_length;
  } catch (error) {
    warn("extraction.model_info.unavailable", context, { model: input.llm.model, ...serializeError(error) });
  }

  const runOnce = async (candidates: RetrievalCandidate[], method: ExtractionMethod): Promise<Attempt> => {
    const formatted = formatContext(candidates, { maxTokens: contextLength ?? DEFAULT_CONTEXT_TOKENS });
    const fullPrompt = fillPromptTemplate(input.llm.prompt_template, promptQuery, formatted.text);
    const response = await llm.generate({
      model: input.llm.model,
      prompt: fullPrompt,
      temperature: input.llm.temperature,
      maxTokens: input.llm.max_tokens,
      signal: input.signal,
      context
    });
    const parsed = parseLlmResponse(response, promptQuery);
    info("extraction.attempt.parsed", context, {
      method,
      candidate_count: candidates.length,
      context_truncated: formatted.truncated,
      format: parsed.format,
      not_found: parsed.notFound,
      confidence: parsed.confidence
    });
    return {
      parsed,
      request: {
        prompt_template: input.llm.prompt_template,
        query: promptQuery,
        context: formatted.text,
        full_prompt: fullPrompt,
        model: input.llm.model,
        temperature: input.llm.temperature,
        max_tokens: input.llm.max_tokens,
        search_method: method,
        context_length: contextLength,
        response
      }
    };
  };

  let targeted: Attempt | null = null;
  if (input.candidates.length > 0) {
    targeted = await runOnce(input.candidates, input.retrievalMethod);
    if (!targeted.parsed.notFound || !input.useFullScan) {
      return {
        value: targeted.parsed.value,
        confidence: targeted.parsed.confidence,
        source_candidates: input.candidates,
        method: input.retrievalMethod,
        chunks_scanned: null,
        format: targeted.parsed.format,
        llm_request: targeted.request
      };
    }
  } else if (!input.useFullScan) {
    return {
      value: NOT_FOUND_VALUE,
      confidence: 0,
      source_candidates: [],
      method: input.retrievalMethod,
      chunks_scanned: null,
      format: "empty",
      llm_request: notFoundRecord(input, promptQuery, input.retrievalMethod, contextLength)
    };
  }

  ensureNotCancelled();
  const retriever = dependencies?.retriever ?? createRetriever();
  const chunks = await retriever.fullScan(input.applicationId, context);
  info("extraction.full_scan.start", context, { chunk_count: chunks.length, batch_size: batchSize });

  let scanned = 0;
  let last: Attempt | null = targeted;
  for (let start = 0; start < chunks.length; start += batchSize) {
    ensureNotCancelled();
    const batch = chunks.slice(start, start + batchSize);
    const attempt = await runOnce(batch, "full_scan");
    scanned += batch.length;
    last = attempt;
    input.onFullScanProgress?.(scanned, chunks.length);

    if (!attempt.parsed.notFound) {
      info("extraction.full_scan.found", context, { chunks_scanned: scanned, chunk_count: chunks.length });
      return {
        value: attempt.parsed.value,
        confidence: attempt.parsed.confidence,
        source_candidates: chunks,
        method: "full_scan",
        chunks_scanned: scanned,
        format: attempt.parsed.format,
        llm_request: attempt.request
      };
    }
  }

  info("extraction.full_scan.exhausted", context, { chunks_scanned: scanned, chunk_count: chunks.length });
  return {
    value: NOT_FOUND_VALUE,
    confidence: last?.parsed.confidence ?? 0,
    source_candidates: chunks,
    method: "full_scan",
    chunks_scanned: scanned,
    format: last?.parsed.format ?? "empty",
    llm_request: last?.request ?? notFoundRecord(input, promptQuery, "full_scan", contextLength)
  };
};
