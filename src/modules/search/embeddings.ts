import { getOpenAIClient, type OpenAIGateway } from "../../clients/openai.js";
import { withRetries, withTimeout } from "../../clients/retry.js";
import { config } from "../../config/index.js";
import { CancelledByUserError, RetrievalUnavailableError } from "./errors.js";

const EMBEDDING_TIMEOUT_MS = 30_000;

export interface EmbeddingService {
  embed: (text: string, signal?: AbortSignal) => Promise<number[]>;
}

export interface EmbeddingDependencies {
  getGateway?: () => Promise<Pick<OpenAIGateway, "embed">>;
  model?: string;
  retries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
}

// bge models were trained with an instruction prefix on the query side.
export const formatEmbeddingInput = (model: string, text: string): string =>
  /bge/i.test(model) ? `query: ${text}` : text;

export const createEmbeddingService = (dependencies?: EmbeddingDependencies): EmbeddingService => {
  const getGateway = dependencies?.getGateway ?? getOpenAIClient;
  const model = dependencies?.model ?? config.EMBEDDING_MODEL;
  const retries = dependencies?.retries ?? config.EXTERNAL_CALL_RETRIES;
  const retryDelayMs = dependencies?.retryDelayMs ?? config.EXTERNAL_CALL_RETRY_DELAY_MS;
  const timeoutMs = dependencies?.timeoutMs ?? EMBEDDING_TIMEOUT_MS;

  return {
    async embed(text, signal) {
      const input = formatEmbeddingInput(model, text);
      try {
        const gateway = await getGateway();
        return await withRetries(
          () => withTimeout((callSignal) => gateway.embed(model, input, callSignal), timeoutMs, signal),
          { retries, delayMs: retryDelayMs, signal }
        );
      } catch (error) {
        if (signal?.aborted) {
          throw new CancelledByUserError();
        }
        const message = error instanceof Error ? error.message : "unknown embedding error";
        throw new RetrievalUnavailableError(`Embedding service failed: ${message}`, { cause: error });
      }
    }
  };
};
