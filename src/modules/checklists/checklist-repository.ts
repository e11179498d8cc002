import { getPostgresClient } from "../../clients/postgres.js";

export interface ChecklistParameterRecord {
  id: string;
  checklistId: string;
  name: string;
  searchQuery: string;
  llmQuery: string | null;
  orderIndex: number;
  searchLimit: number;
  useReranker: boolean;
  /** Null means every chunk of the application is reranked. */
  rerankLimit: number | null;
  useSmartSearch: boolean;
  hybridThreshold: number;
  vectorWeight: number;
  textWeight: number;
  useFullScan: boolean;
  llmModel: string | null;
  llmPromptTemplate: string | null;
  llmTemperature: number | null;
  llmMaxTokens: number | null;
}

export interface ChecklistRecord {
  id: string;
  name: string;
  parameters: ChecklistParameterRecord[];
}

export interface ChecklistRepositoryPort {
  getChecklistWithParameters: (checklistId: string) => Promise<ChecklistRecord | null>;
}

interface ChecklistRow {
  id: string;
  name: string;
}

interface ChecklistParameterRow {
  id: string;
  checklist_id: string;
  name: string;
  search_query: string;
  llm_query: string | null;
  order_index: number;
  search_limit: number;
  use_reranker: boolean;
  rerank_limit: number | null;
  use_smart_search: boolean;
  hybrid_threshold: number;
  vector_weight: number;
  text_weight: number;
  use_full_scan: boolean;
  llm_model: string | null;
  llm_prompt_template: string | null;
  llm_temperature: number | null;
  llm_max_tokens: number | null;
}

const toParameterRecord = (row: ChecklistParameterRow): ChecklistParameterRecord => ({
  id: row.id,
  checklistId: row.checklist_id,
  name: row.name,
  searchQuery: row.search_query,
  llmQuery: row.llm_query,
  orderIndex: row.order_index,
  searchLimit: row.search_limit,
  useReranker: row.use_reranker,
  rerankLimit: row.rerank_limit,
  useSmartSearch: row.use_smart_search,
  hybridThreshold: row.hybrid_threshold,
  vectorWeight: row.vector_weight,
  textWeight: row.text_weight,
  useFullScan: row.use_full_scan,
  llmModel: row.llm_model,
  llmPromptTemplate: row.llm_prompt_template,
  llmTemperature: row.llm_temperature,
  llmMaxTokens: row.llm_max_tokens
});

export class ChecklistRepository implements ChecklistRepositoryPort {
  async getChecklistWithParameters(checklistId: string): Promise<ChecklistRecord | null> {
    const { pool } = await getPostgresClient();
    const checklistResult = await pool.query<ChecklistRow>(
      `
        SELECT id::text AS id, name
        FROM checklists
        WHERE id::text = $1
      `,
      [checklistId]
    );

    const checklist = checklistResult.rows[0];
    if (!checklist) {
      return null;
    }

    const parameterResult = await pool.query<ChecklistParameterRow>(
      `
        SELECT
          id::text AS id,
          checklist_id::text AS checklist_id,
          name,
          search_query,
          llm_query,
          order_index,
          search_limit,
          use_reranker,
          rerank_limit,
          use_smart_search,
          hybrid_threshold,
          vector_weight,
          text_weight,
          use_full_scan,
          llm_model,
          llm_prompt_template,
          llm_temperature,
          llm_max_tokens
        FROM checklist_parameters
        WHERE checklist_id::text = $1
        ORDER BY order_index ASC, id ASC
      `,
      [checklistId]
    );

    return {
      id: checklist.id,
      name: checklist.name,
      parameters: parameterResult.rows.map(toParameterRecord)
    };
  }
}
