import { beforeEach, describe, expect, it, vi } from "vitest";

const mocks = vi.hoisted(() => ({
  getPostgresClient: vi.fn()
}));

vi.mock("../../src/clients/postgres.js", () => ({
  getPostgresClient: mocks.getPostgresClient
}));

import { ChecklistRepository } from "../../src/modules/checklists/checklist-repository.js";
import { ParameterResultRepository } from "../../src/modules/checklists/parameter-result-repository.js";
import { buildCandidate } from "../../tests/helpers/pipeline-fakes.js";

const parameterRow = {
  id: "11",
  checklist_id: "5",
  name: "Срок полномочий",
  search_query: "срок полномочий директора",
  llm_query: null,
  order_index: 0,
  search_limit: 3,
  use_reranker: true,
  rerank_limit: null,
  use_smart_search: true,
  hybrid_threshold: 10,
  vector_weight: 0.7,
  text_weight: 0.3,
  use_full_scan: false,
  llm_model: null,
  llm_prompt_template: null,
  llm_temperature: 0.2,
  llm_max_tokens: null
};

describe("modules/checklists/checklist-repository", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("loads a checklist and maps its parameter rows", async () => {
    const query = vi
      .fn()
      .mockResolvedValueOnce({ rows: [{ id: "5", name: "Проверка устава" }] })
      .mockResolvedValueOnce({ rows: [parameterRow] });
    mocks.getPostgresClient.mockResolvedValue({ pool: { query } });

    const checklist = await new ChecklistRepository().getChecklistWithParameters("5");

    expect(query).toHaveBeenCalledTimes(2);
    expect(query.mock.calls[0]?.[1]).toEqual(["5"]);
    expect(query.mock.calls[1]?.[0]).toContain("ORDER BY order_index ASC, id ASC");
    expect(checklist).toEqual({
      id: "5",
      name: "Проверка устава",
      parameters: [
        {
          id: "11",
          checklistId: "5",
          name: "Срок полномочий",
          searchQuery: "срок полномочий директора",
          llmQuery: null,
          orderIndex: 0,
          searchLimit: 3,
          useReranker: true,
          rerankLimit: null,
          useSmartSearch: true,
          hybridThreshold: 10,
          vectorWeight: 0.7,
          textWeight: 0.3,
          useFullScan: false,
          llmModel: null,
          llmPromptTemplate: null,
          llmTemperature: 0.2,
          llmMaxTokens: null
        }
      ]
    });
  });

  it("returns null for an unknown checklist without reading parameters", async () => {
    const query = vi.fn().mockResolvedValue({ rows: [] });
    mocks.getPostgresClient.mockResolvedValue({ pool: { query } });

    await expect(new ChecklistRepository().getChecklistWithParameters("404")).resolves.toBeNull();
    expect(query).toHaveBeenCalledTimes(1);
  });
});

describe("modules/checklists/parameter-result-repository", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("upserts one row per application and parameter with JSON columns", async () => {
    const query = vi.fn().mockResolvedValue({ rows: [] });
    mocks.getPostgresClient.mockResolvedValue({ pool: { query } });
    const candidate = buildCandidate(0);

    await new ParameterResultRepository().upsert({
      applicationId: "app-1",
      parameterId: "11",
      status: "ok",
      value: "5 лет",
      confidence: 0.95,
      method: "hybrid",
      chunksScanned: null,
      searchResults: [candidate],
      llmRequest: null,
      error: null
    });

    expect(query).toHaveBeenCalledTimes(1);
    expect(query.mock.calls[0]?.[0]).toContain("ON CONFLICT (application_id, parameter_id) DO UPDATE");
    expect(query.mock.calls[0]?.[1]).toEqual([
      "app-1",
      "11",
      "ok",
      "5 лет",
      0.95,
      "hybrid",
      null,
      JSON.stringify([candidate]),
      null,
      null
    ]);
  });
});
