import { parseSearchConfiguration, type SearchConfigurationDefaults } from "../search/search-config.js";
import { RERANK_ALL, type SearchConfiguration } from "../search/types.js";
import type { ChecklistParameterRecord } from "./checklist-repository.js";

const unlessBlank = (value: string | null): string | undefined =>
  value !== null && value.trim().length > 0 ? value : undefined;

/**
 * Stored parameters go through the same validation as submitted options. LLM
 * extraction is always on for checklist analysis; unset or blank columns take defaults.
 */
export const toParameterConfiguration = (
  parameter: ChecklistParameterRecord,
  defaults: SearchConfigurationDefaults
): SearchConfiguration =>
  parseSearchConfiguration(
    {
      search_limit: parameter.searchLimit,
      use_reranker: parameter.useReranker,
      rerank_limit: parameter.rerankLimit ?? RERANK_ALL,
      use_smart_search: parameter.useSmartSearch,
      vector_weight: parameter.vectorWeight,
      text_weight: parameter.textWeight,
      hybrid_threshold: parameter.hybridThreshold,
      use_full_scan: parameter.useFullScan,
      llm: {
        model: unlessBlank(parameter.llmModel),
        temperature: parameter.llmTemperature ?? undefined,
        max_tokens: parameter.llmMaxTokens ?? undefined,
        prompt_template: unlessBlank(parameter.llmPromptTemplate),
        llm_query: parameter.llmQuery
      }
    },
    defaults
  );
