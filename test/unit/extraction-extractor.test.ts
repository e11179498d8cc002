import { describe, expect, it, vi } from "vitest";
import { extract, fillPromptTemplate, type ExtractInput } from "../../src/modules/extraction/extractor.js";
import { CancelledByUserError, LlmUnavailableError } from "../../src/modules/search/errors.js";
import { NOT_FOUND_VALUE, type LlmOptions } from "../../src/modules/search/types.js";
import { buildCandidates, createFakeRetriever, createScriptedLlm } from "../../tests/helpers/pipeline-fakes.js";

const NOT_FOUND = "Информация не найдена";

const llmOptions: LlmOptions = {
  model: "gemma3:27b",
  temperature: 0.1,
  max_tokens: 1000,
  prompt_template: "Q={query}\nC={context}",
  llm_query: null
};

const baseInput = (overrides: Partial<ExtractInput> = {}): ExtractInput => ({
  applicationId: "app-1",
  query: "Срок",
  candidates: buildCandidates(2),
  llm: llmOptions,
  retrievalMethod: "hybrid",
  useFullScan: false,
  ...overrides
});

const quiet = { logInfo: vi.fn(), logWarn: vi.fn() };

describe("fillPromptTemplate", () => {
  it("substitutes every placeholder literally", () => {
    expect(fillPromptTemplate("{query} / {query} / {context}", "$& цена", "ctx")).toBe("$& цена / $& цена / ctx");
  });
});

describe("extract", () => {
  it("parses a targeted answer and records the request", async () => {
    const llm = createScriptedLlm(["Срок: 5 лет"], { context_length: 4096 });
    const retriever = createFakeRetriever([]);

    const result = await extract(baseInput(), { ...quiet, llm, retriever });

    expect(result).toMatchObject({
      value: "5 лет",
      confidence: 0.95,
      method: "hybrid",
      chunks_scanned: null,
      format: "key_value_exact"
    });
    expect(result.source_candidates.map((candidate) => candidate.chunk_id)).toEqual(["chunk-0", "chunk-1"]);
    expect(result.llm_request).toMatchObject({
      prompt_template: "Q={query}\nC={context}",
      query: "Срок",
      model: "gemma3:27b",
      temperature: 0.1,
      max_tokens: 1000,
      search_method: "hybrid",
      context_length: 4096,
      response: "Срок: 5 лет"
    });
    expect(result.llm_request?.full_prompt).toBe(`Q=Срок\nC=${result.llm_request?.context}`);
    expect(llm.generate).toHaveBeenCalledWith(
      expect.objectContaining({ model: "gemma3:27b", temperature: 0.1, maxTokens: 1000 })
    );
    expect(retriever.fullScan).not.toHaveBeenCalled();
  });

  it("puts the LLM-specific query into the prompt", async () => {
    const llm = createScriptedLlm(["ИНН: 7700000000"]);

    const result = await extract(baseInput({ llm: { ...llmOptions, llm_query: "ИНН" } }), {
      ...quiet,
      llm,
      retriever: createFakeRetriever([])
    });

    expect(llm.prompts[0].startsWith("Q=ИНН\n")).toBe(true);
    expect(result.value).toBe("7700000000");
  });

  it("returns not found without calling the model when nothing was retrieved", async () => {
    const llm = createScriptedLlm(["unused"]);

    const result = await extract(baseInput({ candidates: [] }), { ...quiet, llm, retriever: createFakeRetriever([]) });

    expect(result).toMatchObject({
      value: NOT_FOUND_VALUE,
      confidence: 0,
      method: "hybrid",
      format: "empty",
      source_candidates: []
    });
    expect(result.llm_request?.response).toBe("");
    expect(llm.generate).not.toHaveBeenCalled();
  });

  it("keeps a not-found answer when full scan is off", async () => {
    const llm = createScriptedLlm([NOT_FOUND]);
    const retriever = createFakeRetriever([]);

    const result = await extract(baseInput(), { ...quiet, llm, retriever });

    expect(result).toMatchObject({ value: NOT_FOUND_VALUE, confidence: 0.1, method: "hybrid" });
    expect(retriever.fullScan).not.toHaveBeenCalled();
  });

  it("scans chunk by chunk after a not-found answer until one yields a value", async () => {
    const llm = createScriptedLlm([NOT_FOUND, NOT_FOUND, NOT_FOUND, "Срок: 7 лет"]);
    const chunks = buildCandidates(4);
    const retriever = createFakeRetriever([], chunks);
    const progress: Array<[number, number]> = [];

    const result = await extract(
      baseInput({ useFullScan: true, onFullScanProgress: (scanned, total) => progress.push([scanned, total]) }),
      { ...quiet, llm, retriever, fullScanBatchSize: 1 }
    );

    expect(result.method).toBe("full_scan");
    expect(result.value).toBe("7 лет");
    expect(result.chunks_scanned).toBe(3);
    expect(result.source_candidates).toHaveLength(4);
    expect(result.llm_request?.search_method).toBe("full_scan");
    expect(progress).toEqual([
      [1, 4],
      [2, 4],
      [3, 4]
    ]);
    expect(llm.generate).toHaveBeenCalledTimes(4);
  });

  it("covers every chunk when the scan is exhausted", async () => {
    const llm = createScriptedLlm([NOT_FOUND]);
    const chunks = buildCandidates(5);

    const result = await extract(baseInput({ useFullScan: true }), {
      ...quiet,
      llm,
      retriever: createFakeRetriever([], chunks),
      fullScanBatchSize: 2
    });

    expect(result).toMatchObject({
      value: NOT_FOUND_VALUE,
      confidence: 0.1,
      method: "full_scan",
      chunks_scanned: 5
    });
    expect(result.source_candidates.map((candidate) => candidate.chunk_id)).toEqual(
      chunks.map((chunk) => chunk.chunk_id)
    );
    // one targeted call plus batches of 2, 2 and 1
    expect(llm.generate).toHaveBeenCalledTimes(4);
  });

  it("stops the scan when the task is cancelled between batches", async () => {
    const llm = createScriptedLlm([NOT_FOUND]);
    let checks = 0;

    await expect(
      extract(
        baseInput({
          useFullScan: true,
          isCancelled: () => {
            checks += 1;
            return checks > 2;
          }
        }),
        { ...quiet, llm, retriever: createFakeRetriever([], buildCandidates(5)), fullScanBatchSize: 1 }
      )
    ).rejects.toBeInstanceOf(CancelledByUserError);
    // targeted call, then the first scanned chunk
    expect(llm.generate).toHaveBeenCalledTimes(2);
  });

  it("continues without a context length when model details are unavailable", async () => {
    const llm = createScriptedLlm(["Срок: 5 лет"]);
    vi.mocked(llm.modelInfo).mockRejectedValue(new LlmUnavailableError("no details"));
    const logWarn = vi.fn();

    const result = await extract(baseInput(), { logInfo: vi.fn(), logWarn, llm, retriever: createFakeRetriever([]) });

    expect(result.llm_request?.context_length).toBeNull();
    expect(logWarn).toHaveBeenCalledWith(
      "extraction.model_info.unavailable",
      {},
      expect.objectContaining({ model: "gemma3:27b" })
    );
  });

  it("propagates an unavailable model as a fatal error", async () => {
    const llm = createScriptedLlm(["unused"]);
    vi.mocked(llm.generate).mockRejectedValue(new LlmUnavailableError("LLM generation failed: timeout"));

    await expect(extract(baseInput(), { ...quiet, llm, retriever: createFakeRetriever([]) })).rejects.toBeInstanceOf(
      LlmUnavailableError
    );
  });
});
