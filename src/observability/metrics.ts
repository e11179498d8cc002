import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

interface LatencySummary {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
}

interface LlmUsageSummary {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

interface MetricsState {
  requestLatency: LatencySummary;
  retrievalLatency: LatencySummary;
  rerankLatency: LatencySummary;
  llmLatency: LatencySummary;
  taskDuration: LatencySummary;
  llmUsage: LlmUsageSummary;
  taskOutcomes: Record<string, number>;
  errorRates: Record<string, number>;
}

const createLatencySummary = (): LatencySummary => ({
  count: 0,
  totalMs: 0,
  minMs: Number.POSITIVE_INFINITY,
  maxMs: 0
});

const createUsageSummary = (): LlmUsageSummary => ({
  promptTokens: 0,
  completionTokens: 0,
  totalTokens: 0
});

const state: MetricsState = {
  requestLatency: createLatencySummary(),
  retrievalLatency: createLatencySummary(),
  rerankLatency: createLatencySummary(),
  llmLatency: createLatencySummary(),
  taskDuration: createLatencySummary(),
  llmUsage: createUsageSummary(),
  taskOutcomes: {},
  errorRates: {}
};

const requestStartTimes = new WeakMap<FastifyRequest, number>();

const recordLatency = (summary: LatencySummary, durationMs: number): void => {
  const safeDuration = Number.isFinite(durationMs) ? Math.max(0, durationMs) : 0;
  summary.count += 1;
  summary.totalMs += safeDuration;
  summary.minMs = Math.min(summary.minMs, safeDuration);
  summary.maxMs = Math.max(summary.maxMs, safeDuration);
};

const roundTo2Decimals = (value: number): number => Math.round((value + Number.EPSILON) * 100) / 100;

const serializeLatency = (summary: LatencySummary): { count: number; avgMs: number; minMs: number; maxMs: number } => {
  if (summary.count === 0) {
    return { count: 0, avgMs: 0, minMs: 0, maxMs: 0 };
  }
  return {
    count: summary.count,
    avgMs: roundTo2Decimals(summary.totalMs / summary.count),
    minMs: roundTo2Decimals(summary.minMs),
    maxMs: roundTo2Decimals(summary.maxMs)
  };
};

export const recordRequestLatency = (durationMs: number): void => {
  recordLatency(state.requestLatency, durationMs);
};

export const recordRetrievalLatency = (durationMs: number): void => {
  recordLatency(state.retrievalLatency, durationMs);
};

export const recordRerankLatency = (durationMs: number): void => {
  recordLatency(state.rerankLatency, durationMs);
};

export const recordLlmLatency = (durationMs: number): void => {
  recordLatency(state.llmLatency, durationMs);
};

export const recordLlmUsage = (usage: {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}): void => {
  state.llmUsage.promptTokens += usage.promptTokens ?? 0;
  state.llmUsage.completionTokens += usage.completionTokens ?? 0;
  state.llmUsage.totalTokens += usage.totalTokens ?? 0;
};

export const recordTaskOutcome = (status: string, durationMs: number): void => {
  recordLatency(state.taskDuration, durationMs);
  state.taskOutcomes[status] = (state.taskOutcomes[status] ?? 0) + 1;
};

export const recordErrorRate = (key: string): void => {
  state.errorRates[key] = (state.errorRates[key] ?? 0) + 1;
};

export const getMetricsSnapshot = (): Record<string, unknown> => ({
  request_latency: serializeLatency(state.requestLatency),
  retrieval_latency: serializeLatency(state.retrievalLatency),
  rerank_latency: serializeLatency(state.rerankLatency),
  llm_latency: serializeLatency(state.llmLatency),
  llm_usage: { ...state.llmUsage },
  task_duration: serializeLatency(state.taskDuration),
  task_outcomes: { ...state.taskOutcomes },
  error_rates: { ...state.errorRates }
});

export const resetMetrics = (): void => {
  state.requestLatency = createLatencySummary();
  state.retrievalLatency = createLatencySummary();
  state.rerankLatency = createLatencySummary();
  state.llmLatency = createLatencySummary();
  state.taskDuration = createLatencySummary();
  state.llmUsage = createUsageSummary();
  state.taskOutcomes = {};
  state.errorRates = {};
};

export const registerMetricsRoutes = async (app: FastifyInstance): Promise<void> => {
  app.get("/metrics", async () => getMetricsSnapshot());
};

export const registerRequestMetricsHooks = (app: FastifyInstance): void => {
  app.addHook("onRequest", async (request: FastifyRequest, reply: FastifyReply) => {
    requestStartTimes.set(request, Date.now());
    reply.header("x-request-id", request.id);
  });

  app.addHook("onResponse", async (request: FastifyRequest, reply: FastifyReply) => {
    const startedAt = requestStartTimes.get(request) ?? Date.now();
    requestStartTimes.delete(request);
    recordRequestLatency(Date.now() - startedAt);
    if (reply.statusCode >= 400) {
      recordErrorRate(`http_${reply.statusCode}`);
    }
  });

  app.addHook("onError", async (_request, reply) => {
    recordErrorRate(`http_${reply.statusCode || 500}`);
  });
};
