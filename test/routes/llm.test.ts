import Fastify from "fastify";
import { describe, expect, it, vi } from "vitest";
import { registerLlmRoutes } from "../../src/api/routes/llm.js";
import { LlmUnavailableError } from "../../src/modules/search/errors.js";
import { createScriptedLlm } from "../../tests/helpers/pipeline-fakes.js";

describe("registerLlmRoutes", () => {
  it("lists generation models and describes one", async () => {
    const llm = createScriptedLlm([], { context_length: 131072, family: "gemma3", parameter_size: "27.4B" });
    const app = Fastify();
    try {
      await registerLlmRoutes(app, { llm });

      const models = await app.inject({ method: "GET", url: "/llm/models" });
      expect(models.statusCode).toBe(200);
      expect(models.json()).toEqual({ models: ["gemma3:27b"] });

      const info = await app.inject({ method: "GET", url: "/llm/models/gemma3:27b" });
      expect(info.statusCode).toBe(200);
      expect(info.json()).toEqual({
        name: "gemma3:27b",
        context_length: 131072,
        family: "gemma3",
        parameter_size: "27.4B"
      });
    } finally {
      await app.close();
    }
  });

  it("returns 503 when the model server is unavailable", async () => {
    const llm = createScriptedLlm([]);
    vi.mocked(llm.listModels).mockRejectedValue(new LlmUnavailableError("Listing models failed: connect ECONNREFUSED"));
    vi.mocked(llm.modelInfo).mockRejectedValue(new LlmUnavailableError("Model details unavailable"));
    const app = Fastify();
    try {
      await registerLlmRoutes(app, { llm });

      const models = await app.inject({ method: "GET", url: "/llm/models" });
      expect(models.statusCode).toBe(503);
      expect(models.json()).toEqual({ detail: "Сервис языковой модели недоступен. Повторите попытку позже." });

      const info = await app.inject({ method: "GET", url: "/llm/models/gemma3:27b" });
      expect(info.statusCode).toBe(503);
    } finally {
      await app.close();
    }
  });
});
