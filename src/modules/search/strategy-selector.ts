import { ValidationError } from "./errors.js";
import type { SearchConfiguration, StrategyDecision } from "./types.js";

type SelectorConfig = Pick<
  SearchConfiguration,
  "use_smart_search" | "hybrid_threshold" | "vector_weight" | "text_weight"
>;

/**
 * Picks the retrieval method for a query. Short queries go hybrid when smart
 * search is on; reranking never influences the choice.
 */
export const selectStrategy = (query: string, config: SelectorConfig): StrategyDecision => {
  if (query.length === 0) {
    throw new ValidationError([{ type: "value_error", loc: ["query"], msg: "query must be a non-empty string" }]);
  }

  if (!config.use_smart_search) {
    return { method: "vector", weights: null };
  }

  // Character count, not UTF-16 units.
  if ([...query].length < config.hybrid_threshold) {
    return {
      method: "hybrid",
      weights: { vector_weight: config.vector_weight, text_weight: config.text_weight }
    };
  }

  return { method: "vector", weights: null };
};
