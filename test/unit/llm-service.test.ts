import { describe, expect, it, vi } from "vitest";
import { createLlmService, resolveOllamaUrl } from "../../src/modules/llm/llm-service.js";
import { CancelledByUserError, LlmUnavailableError } from "../../src/modules/search/errors.js";

const baseDependencies = {
  retries: 2,
  retryDelayMs: 0,
  timeoutMs: 1000,
  embeddingModel: "bge-m3",
  logInfo: vi.fn(),
  now: () => 0
};

describe("resolveOllamaUrl", () => {
  it("prefers the explicit URL and strips the OpenAI-compatible suffix otherwise", () => {
    expect(resolveOllamaUrl("http://ollama:11434/", undefined)).toBe("http://ollama:11434");
    expect(resolveOllamaUrl(undefined, "http://ollama:11434/v1")).toBe("http://ollama:11434");
    expect(resolveOllamaUrl(undefined, undefined)).toBeNull();
  });
});

describe("createLlmService.generate", () => {
  it("sends one user message and records latency and usage", async () => {
    const complete = vi.fn().mockResolvedValue({
      content: "Срок: 5 лет",
      usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 }
    });
    const recordLlmLatency = vi.fn();
    const recordLlmUsage = vi.fn();
    const service = createLlmService({
      ...baseDependencies,
      getGateway: async () => ({ complete, listModels: vi.fn() }),
      recordLlmLatency,
      recordLlmUsage
    });

    await expect(
      service.generate({ model: "gemma3:27b", prompt: "вопрос", temperature: 0.1, maxTokens: 1000 })
    ).resolves.toBe("Срок: 5 лет");

    expect(complete).toHaveBeenCalledWith(
      expect.objectContaining({
        model: "gemma3:27b",
        temperature: 0.1,
        maxTokens: 1000,
        messages: [{ role: "user", content: "вопрос" }]
      })
    );
    expect(recordLlmLatency).toHaveBeenCalledWith(0);
    expect(recordLlmUsage).toHaveBeenCalledWith({ promptTokens: 10, completionTokens: 5, totalTokens: 15 });
  });

  it("retries and then reports the model as unavailable", async () => {
    const complete = vi.fn().mockRejectedValue(new Error("connect ECONNREFUSED"));
    const service = createLlmService({
      ...baseDependencies,
      getGateway: async () => ({ complete, listModels: vi.fn() })
    });

    await expect(
      service.generate({ model: "gemma3:27b", prompt: "вопрос", temperature: 0.1, maxTokens: 10 })
    ).rejects.toThrow(new LlmUnavailableError("LLM generation failed: connect ECONNREFUSED"));
    expect(complete).toHaveBeenCalledTimes(2);
  });

  it("reports cancellation when the caller aborted", async () => {
    const controller = new AbortController();
    const complete = vi.fn(async () => {
      controller.abort();
      throw new Error("Request was aborted.");
    });
    const service = createLlmService({
      ...baseDependencies,
      getGateway: async () => ({ complete, listModels: vi.fn() })
    });

    await expect(
      service.generate({ model: "m", prompt: "p", temperature: 0, maxTokens: 10, signal: controller.signal })
    ).rejects.toBeInstanceOf(CancelledByUserError);
    expect(complete).toHaveBeenCalledTimes(1);
  });
});

describe("createLlmService.listModels", () => {
  it("hides the embedding model", async () => {
    const service = createLlmService({
      ...baseDependencies,
      getGateway: async () => ({
        complete: vi.fn(),
        listModels: vi.fn().mockResolvedValue(["gemma3:27b", "bge-m3:latest", "bge-m3", "qwen2.5:14b"])
      })
    });

    await expect(service.listModels()).resolves.toEqual(["gemma3:27b", "qwen2.5:14b"]);
  });
});

describe("createLlmService.modelInfo", () => {
  it("reads context length and details from the model details endpoint and caches them", async () => {
    const fetch = vi.fn(async () => ({
      ok: true,
      status: 200,
      json: async () => ({
        details: { family: "gemma3", parameter_size: "27.4B" },
        model_info: { "general.architecture": "gemma3", "gemma3.context_length": 131072 }
      })
    }));
    const service = createLlmService({ ...baseDependencies, ollamaUrl: "http://ollama:11434", fetch });

    const expected = { name: "gemma3:27b", context_length: 131072, family: "gemma3", parameter_size: "27.4B" };
    await expect(service.modelInfo("gemma3:27b")).resolves.toEqual(expected);
    await expect(service.modelInfo("gemma3:27b")).resolves.toEqual(expected);

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(fetch).toHaveBeenCalledWith(
      "http://ollama:11434/api/show",
      expect.objectContaining({ method: "POST", body: JSON.stringify({ name: "gemma3:27b" }) })
    );
  });

  it("returns empty details when no native endpoint is configured", async () => {
    const service = createLlmService({ ...baseDependencies, ollamaUrl: null });

    await expect(service.modelInfo("gemma3:27b")).resolves.toEqual({
      name: "gemma3:27b",
      context_length: null,
      family: null,
      parameter_size: null
    });
  });

  it("reports an unavailable endpoint", async () => {
    const fetch = vi.fn(async () => ({ ok: false, status: 500, json: async () => ({}) }));
    const service = createLlmService({ ...baseDependencies, ollamaUrl: "http://ollama:11434", fetch });

    await expect(service.modelInfo("gemma3:27b")).rejects.toThrow(
      new LlmUnavailableError("Model details for gemma3:27b unavailable: model details request returned 500")
    );
  });
});
