import Fastify from "fastify";
import { describe, expect, it, vi } from "vitest";
import { registerTaskRoutes } from "../../src/api/routes/tasks.js";
import { SearchPipeline, type SearchPipelineDependencies } from "../../src/modules/pipeline/search-pipeline.js";
import { TaskRegistry } from "../../src/modules/tasks/task-registry.js";
import {
  InMemoryChecklistRepository,
  InMemoryParameterResultRepository,
  buildParameter
} from "../../tests/helpers/in-memory-checklist-repository.js";
import { buildCandidates, createFakeRetriever, createScriptedLlm } from "../../tests/helpers/pipeline-fakes.js";

const createTestApp = async (overrides: SearchPipelineDependencies = {}) => {
  let sequence = 0;
  const checklists = new InMemoryChecklistRepository();
  checklists.seedChecklist({ id: "1", name: "Проверка устава", parameters: [buildParameter({ id: "p1", searchQuery: "Срок" })] });
  const pipeline = new SearchPipeline({
    registry: new TaskRegistry({
      generateId: () => {
        sequence += 1;
        return `task-${sequence}`;
      }
    }),
    retriever: createFakeRetriever(buildCandidates(5)),
    llm: createScriptedLlm(["Срок: 5 лет"]),
    checklists,
    results: new InMemoryParameterResultRepository(),
    defaults: { model: "gemma3:27b", promptTemplate: "{query}\n{context}" },
    ...overrides
  });
  const app = Fastify();
  await registerTaskRoutes(app, { pipeline });
  return { app, pipeline };
};

describe("registerTaskRoutes", () => {
  it("accepts a search and serves its status until completion", async () => {
    const { app, pipeline } = await createTestApp();
    try {
      const accepted = await app.inject({
        method: "POST",
        url: "/search",
        payload: { application_id: "app-1", query: "устав", options: { search_limit: 2 } }
      });

      expect(accepted.statusCode).toBe(202);
      expect(accepted.json()).toEqual({ task_id: "task-1" });

      await pipeline.whenIdle();
      const status = await app.inject({ method: "GET", url: "/tasks/task-1/status" });

      expect(status.statusCode).toBe(200);
      expect(status.json()).toMatchObject({
        task_id: "task-1",
        kind: "search",
        status: "success",
        stage: "success",
        progress: 100,
        stages: ["starting", "initializing", "hybrid_search", "finishing"],
        cancel_requested: false,
        result: { kind: "search", application_id: "app-1", query: "устав", method: "hybrid" }
      });
      expect(status.json().result.candidates).toHaveLength(2);
    } finally {
      await app.close();
    }
  });

  it("rejects malformed bodies with field-level details", async () => {
    const { app } = await createTestApp();
    try {
      const missingQuery = await app.inject({ method: "POST", url: "/search", payload: { application_id: "app-1" } });
      expect(missingQuery.statusCode).toBe(422);
      expect(missingQuery.json()).toEqual({
        detail: [{ type: "invalid_type", loc: ["body", "query"], msg: "query is required" }]
      });

      const badWeight = await app.inject({
        method: "POST",
        url: "/search",
        payload: { application_id: "app-1", query: "устав", options: { vector_weight: 1.5 } }
      });
      expect(badWeight.statusCode).toBe(422);
      expect(badWeight.json()).toEqual({
        detail: [
          { type: "too_big", loc: ["body", "options", "vector_weight"], msg: "vector_weight must be between 0 and 1" }
        ]
      });

      const blankQuery = await app.inject({
        method: "POST",
        url: "/search",
        payload: { application_id: "app-1", query: "   " }
      });
      expect(blankQuery.statusCode).toBe(422);
      expect(blankQuery.json()).toEqual({
        detail: [{ type: "value_error", loc: ["body", "query"], msg: "query must be a non-empty string" }]
      });
    } finally {
      await app.close();
    }
  });

  it("accepts numeric checklist ids and rejects unknown checklists", async () => {
    const { app, pipeline } = await createTestApp();
    try {
      const accepted = await app.inject({
        method: "POST",
        url: "/analysis",
        payload: { application_id: "app-1", checklist_id: 1 }
      });
      expect(accepted.statusCode).toBe(202);
      expect(accepted.json()).toEqual({ task_id: "task-1" });

      const unknown = await app.inject({
        method: "POST",
        url: "/analysis",
        payload: { application_id: "app-1", checklist_id: "999" }
      });
      expect(unknown.statusCode).toBe(422);
      expect(unknown.json()).toEqual({
        detail: [{ type: "not_found", loc: ["body", "checklist_id"], msg: "checklist 999 not found" }]
      });

      await pipeline.whenIdle();
      const status = await app.inject({ method: "GET", url: "/tasks/task-1/status" });
      expect(status.json()).toMatchObject({
        kind: "analysis",
        status: "success",
        result: { processed: 1, errors: 0, total: 1, outcome: "analyzed" }
      });
    } finally {
      await app.close();
    }
  });

  it("cancels a running task", async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const retriever = createFakeRetriever(buildCandidates(5));
    vi.mocked(retriever.retrieve).mockImplementationOnce(async (input) => {
      await gate;
      return buildCandidates(5).slice(0, input.limit);
    });
    const { app, pipeline } = await createTestApp({ retriever });
    try {
      await app.inject({ method: "POST", url: "/search", payload: { application_id: "app-1", query: "устав" } });
      await vi.waitFor(() => {
        expect(retriever.retrieve).toHaveBeenCalledTimes(1);
      });

      const cancelled = await app.inject({ method: "POST", url: "/tasks/task-1/cancel" });
      expect(cancelled.statusCode).toBe(200);
      expect(cancelled.json()).toEqual({ task_id: "task-1", cancel_requested: true, status: "progress" });

      release();
      await pipeline.whenIdle();
      const status = await app.inject({ method: "GET", url: "/tasks/task-1/status" });
      expect(status.json()).toMatchObject({ status: "cancelled", cancel_requested: true });
      expect(status.json().result).toBeUndefined();
    } finally {
      await app.close();
    }
  });

  it("returns 404 for unknown tasks", async () => {
    const { app } = await createTestApp();
    try {
      const status = await app.inject({ method: "GET", url: "/tasks/missing/status" });
      expect(status.statusCode).toBe(404);
      expect(status.json()).toEqual({ detail: "Task missing not found" });

      const cancel = await app.inject({ method: "POST", url: "/tasks/missing/cancel" });
      expect(cancel.statusCode).toBe(404);
      expect(cancel.json()).toEqual({ detail: "Task missing not found" });
    } finally {
      await app.close();
    }
  });
});
