import { z } from "zod";
import { getOpenAIClient, type OpenAIGateway } from "../../clients/openai.js";
import { withRetries, withTimeout } from "../../clients/retry.js";
import { config } from "../../config/index.js";
import { logDebug, logInfo, type CorrelationContext } from "../../observability/logger.js";
import { recordLlmLatency, recordLlmUsage } from "../../observability/metrics.js";
import { CancelledByUserError, LlmUnavailableError } from "../search/errors.js";

export interface GenerateRequest {
  model: string;
  prompt: string;
  temperature: number;
  maxTokens: number;
  signal?: AbortSignal;
  context?: CorrelationContext;
}

export interface ModelInfo {
  name: string;
  context_length: number | null;
  family: string | null;
  parameter_size: string | null;
}

export interface LlmService {
  generate: (request: GenerateRequest) => Promise<string>;
  listModels: () => Promise<string[]>;
  modelInfo: (name: string) => Promise<ModelInfo>;
}

type FetchLike = (input: string, init?: { method?: string; headers?: Record<string, string>; body?: string; signal?: AbortSignal }) => Promise<{
  ok: boolean;
  status: number;
  json: () => Promise<unknown>;
}>;

export interface LlmServiceDependencies {
  getGateway?: () => Promise<Pick<OpenAIGateway, "complete" | "listModels">>;
  fetch?: FetchLike;
  now?: () => number;
  ollamaUrl?: string | null;
  embeddingModel?: string;
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
  logInfo?: typeof logInfo;
  recordLlmLatency?: typeof recordLlmLatency;
  recordLlmUsage?: typeof recordLlmUsage;
}

const MODEL_INFO_TIMEOUT_MS = 10_000;

const showResponseSchema = z.object({
  details: z
    .object({
      family: z.string().optional(),
      parameter_size: z.string().optional()
    })
    .partial()
    .optional(),
  model_info: z.record(z.unknown()).optional()
});

export const resolveOllamaUrl = (
  explicit: string | undefined = config.OLLAMA_URL,
  openAIBaseUrl: string | undefined = config.OPENAI_BASE_URL
): string | null => {
  const candidate = explicit ?? openAIBaseUrl?.replace(/\/v1\/?$/, "");
  return candidate ? candidate.replace(/\/+$/, "") : null;
};

const readContextLength = (modelInfo: Record<string, unknown> | undefined): number | null => {
  if (!modelInfo) {
    return null;
  }
  for (const [key, value] of Object.entries(modelInfo)) {
    if (key.endsWith(".context_length") && typeof value === "number" && value > 0) {
      return value;
    }
  }
  return null;
};

const isEmbeddingModel = (name: string, embeddingModel: string): boolean => {
  const base = embeddingModel.split(":")[0];
  return name === embeddingModel || name.split(":")[0] === base;
};

export const createLlmService = (dependencies?: LlmServiceDependencies): LlmService => {
  const getGateway = dependencies?.getGateway ?? getOpenAIClient;
  const fetchImpl: FetchLike = dependencies?.fetch ?? ((input, init) => fetch(input, init));
  const now = dependencies?.now ?? Date.now;
  const ollamaUrl = dependencies?.ollamaUrl !== undefined ? dependencies.ollamaUrl : resolveOllamaUrl();
  const embeddingModel = dependencies?.embeddingModel ?? config.EMBEDDING_MODEL;
  const timeoutMs = dependencies?.timeoutMs ?? config.LLM_TIMEOUT_MS;
  const retries = dependencies?.retries ?? config.EXTERNAL_CALL_RETRIES;
  const retryDelayMs = dependencies?.retryDelayMs ?? config.EXTERNAL_CALL_RETRY_DELAY_MS;
  const info = dependencies?.logInfo ?? logInfo;
  const recordLatency = dependencies?.recordLlmLatency ?? recordLlmLatency;
  const recordUsage = dependencies?.recordLlmUsage ?? recordLlmUsage;
  const modelInfoCache = new Map<string, ModelInfo>();

  return {
    async generate(request) {
      const context = request.context ?? {};
      const startedAt = now();
      try {
        const gateway = await getGateway();
        const result = await withRetries(
          () =>
            withTimeout(
              (signal) =>
                gateway.complete({
                  model: request.model,
                  temperature: request.temperature,
                  maxTokens: request.maxTokens,
                  signal,
                  messages: [{ role: "user", content: request.prompt }]
                }),
              timeoutMs,
              request.signal
            ),
          { retries, delayMs: retryDelayMs, signal: request.signal }
        );

        const latencyMs = now() - startedAt;
        recordLatency(latencyMs);
        if (result.usage) {
          recordUsage(result.usage);
        }
        info("llm.generate.complete", context, {
          model: request.model,
          prompt_chars: request.prompt.length,
          response_chars: result.content.length,
          latency_ms: latencyMs
        });
        logDebug("llm.generate.response", context, { model: request.model, response: result.content });
        return result.content;
      } catch (error) {
        if (request.signal?.aborted) {
          throw new CancelledByUserError();
        }
        const message = error instanceof Error ? error.message : "unknown llm error";
        throw new LlmUnavailableError(`LLM generation failed: ${message}`, { cause: error });
      }
    },

    async listModels() {
      try {
        const gateway = await getGateway();
        const names = await gateway.listModels();
        return names.filter((name) => !isEmbeddingModel(name, embeddingModel));
      } catch (error) {
        const message = error instanceof Error ? error.message : "unknown llm error";
        throw new LlmUnavailableError(`Listing models failed: ${message}`, { cause: error });
      }
    },

    async modelInfo(name) {
      const cached = modelInfoCache.get(name);
      if (cached) {
        return cached;
      }

      const empty: ModelInfo = { name, context_length: null, family: null, parameter_size: null };
      if (!ollamaUrl) {
        return empty;
      }

      let body: unknown;
      try {
        body = await withTimeout(async (signal) => {
          const response = await fetchImpl(`${ollamaUrl}/api/show`, {
            method: "POST",
            headers: { "content-type": "application/json" },
            body: JSON.stringify({ name }),
            signal
          });
          if (!response.ok) {
            throw new Error(`model details request returned ${response.status}`);
          }
          return response.json();
        }, MODEL_INFO_TIMEOUT_MS);
      } catch (error) {
        const message = error instanceof Error ? error.message : "unknown llm error";
        throw new LlmUnavailableError(`Model details for ${name} unavailable: ${message}`, { cause: error });
      }

      const parsed = showResponseSchema.safeParse(body);
      if (!parsed.success) {
        return empty;
      }

      const details: ModelInfo = {
        name,
        context_length: readContextLength(parsed.data.model_info),
        family: parsed.data.details?.family ?? null,
        parameter_size: parsed.data.details?.parameter_size ?? null
      };
      modelInfoCache.set(name, details);
      return details;
    }
  };
};
