import { z } from "zod";
import { ValidationError, type ValidationIssue } from "./errors.js";
import { RERANK_ALL, type SearchConfiguration } from "./types.js";

export const DEFAULT_SEARCH_LIMIT = 3;
export const DEFAULT_RERANK_LIMIT = 10;
export const DEFAULT_HYBRID_THRESHOLD = 10;
export const DEFAULT_VECTOR_WEIGHT = 0.5;
export const DEFAULT_TEXT_WEIGHT = 0.5;
export const DEFAULT_LLM_TEMPERATURE = 0.1;
export const DEFAULT_LLM_MAX_TOKENS = 1000;

export interface SearchConfigurationDefaults {
  model: string;
  promptTemplate: string;
}

const weightSchema = (name: string) =>
  z
    .number({ invalid_type_error: `${name} must be a number` })
    .min(0, `${name} must be between 0 and 1`)
    .max(1, `${name} must be between 0 and 1`);

export const createSearchConfigurationSchema = (defaults: SearchConfigurationDefaults) => {
  const llmOptionsSchema = z.object({
    model: z.string().trim().min(1).default(defaults.model),
    temperature: z.number().min(0).max(2).default(DEFAULT_LLM_TEMPERATURE),
    max_tokens: z.number().int().positive().max(32_768).default(DEFAULT_LLM_MAX_TOKENS),
    prompt_template: z.string().trim().min(1).default(defaults.promptTemplate),
    llm_query: z
      .string()
      .nullish()
      .transform((value) => (value && value.trim().length > 0 ? value.trim() : null))
  });

  return z.object({
    search_limit: z.number().int().min(1).max(100).default(DEFAULT_SEARCH_LIMIT),
    use_reranker: z.boolean().default(false),
    rerank_limit: z
      .union([z.literal(RERANK_ALL), z.number().int().min(1)])
      .default(DEFAULT_RERANK_LIMIT),
    use_smart_search: z.boolean().default(true),
    vector_weight: weightSchema("vector_weight").default(DEFAULT_VECTOR_WEIGHT),
    text_weight: weightSchema("text_weight").default(DEFAULT_TEXT_WEIGHT),
    hybrid_threshold: z.number().int().min(0).default(DEFAULT_HYBRID_THRESHOLD),
    use_full_scan: z.boolean().default(false),
    llm: llmOptionsSchema.nullish().transform((value) => value ?? null)
  });
};

export const toValidationIssues = (
  error: z.ZodError,
  prefix: Array<string | number> = []
): ValidationIssue[] =>
  error.issues.map((issue) => ({
    type: issue.code,
    loc: [...prefix, ...issue.path],
    msg: issue.message
  }));

/**
 * Validates raw options once, at submission. The returned object is frozen
 * and lives unchanged for the whole task.
 */
export const parseSearchConfiguration = (
  raw: unknown,
  defaults: SearchConfigurationDefaults
): SearchConfiguration => {
  const parsed = createSearchConfigurationSchema(defaults).safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ValidationError(toValidationIssues(parsed.error, ["options"]));
  }
  const llm = parsed.data.llm ? Object.freeze({ ...parsed.data.llm }) : null;
  return Object.freeze({ ...parsed.data, llm });
};

export const validateQuery = (query: unknown): string => {
  if (typeof query !== "string" || query.trim().length === 0) {
    throw new ValidationError([{ type: "value_error", loc: ["query"], msg: "query must be a non-empty string" }]);
  }
  return query.trim();
};
