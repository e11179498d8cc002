import OpenAI from "openai";
import { config } from "../config/index.js";
import { withRetries, withTimeout } from "./retry.js";

type HealthStatus = "ok" | "error";

export type ChatRole = "system" | "user";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
  jsonResponse?: boolean;
  signal?: AbortSignal;
}

export interface ChatCompletionUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ChatCompletionResult {
  content: string;
  usage: ChatCompletionUsage | null;
}

/** The slice of the OpenAI-compatible API the pipeline talks to. */
export interface OpenAIGateway {
  complete: (request: ChatCompletionRequest) => Promise<ChatCompletionResult>;
  embed: (model: string, input: string, signal?: AbortSignal) => Promise<number[]>;
  listModels: () => Promise<string[]>;
}

export interface OpenAISingleton extends OpenAIGateway {
  client: OpenAI;
  healthCheck: () => Promise<{ status: HealthStatus; details?: string }>;
}

const HEALTH_TIMEOUT_MS = 7000;

let singleton: OpenAISingleton | null = null;

const toSdkMessages = (messages: ChatMessage[]) =>
  messages.map((message) =>
    message.role === "system"
      ? { role: "system" as const, content: message.content }
      : { role: "user" as const, content: message.content }
  );

function initialize(): OpenAISingleton {
  // Retries and deadlines are applied by the callers, per collaborator.
  const client = new OpenAI({
    apiKey: config.OPENAI_API_KEY,
    baseURL: config.OPENAI_BASE_URL,
    maxRetries: 0,
    timeout: config.LLM_TIMEOUT_MS
  });

  console.info("[clients/openai] initialized singleton");

  return {
    client,
    async complete(request) {
      const completion = await client.chat.completions.create(
        {
          model: request.model,
          messages: toSdkMessages(request.messages),
          temperature: request.temperature,
          max_tokens: request.maxTokens,
          ...(request.jsonResponse ? { response_format: { type: "json_object" as const } } : {})
        },
        { signal: request.signal }
      );

      const usage = completion.usage;
      return {
        content: completion.choices[0]?.message?.content ?? "",
        usage: usage
          ? {
              promptTokens: usage.prompt_tokens,
              completionTokens: usage.completion_tokens,
              totalTokens: usage.total_tokens
            }
          : null
      };
    },
    async embed(model, input, signal) {
      const response = await client.embeddings.create({ model, input }, { signal });
      const embedding = response.data[0]?.embedding;
      if (!embedding || embedding.length === 0) {
        throw new Error("Embedding response missing vector payload.");
      }
      return embedding;
    },
    async listModels() {
      const names: string[] = [];
      for await (const model of client.models.list()) {
        names.push(model.id);
      }
      return names;
    },
    async healthCheck() {
      try {
        await withRetries(
          async () =>
            withTimeout(async (signal) => {
              await client.models.retrieve(config.LLM_DEFAULT_MODEL, { signal });
            }, HEALTH_TIMEOUT_MS),
          { retries: config.EXTERNAL_CALL_RETRIES, delayMs: config.EXTERNAL_CALL_RETRY_DELAY_MS }
        );
        return { status: "ok" };
      } catch (error) {
        const details = error instanceof Error ? error.message : "unknown error";
        return { status: "error", details };
      }
    }
  };
}

export async function getOpenAIClient(): Promise<OpenAISingleton> {
  if (!singleton) {
    singleton = initialize();
  }

  return singleton;
}

export async function shutdownOpenAIClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  console.info("[clients/openai] shutdown complete");
}

export function resetOpenAIClientForTests(): void {
  singleton = null;
}
