import { getPostgresClient } from "../../clients/postgres.js";
import type { ExtractionMethod, LlmRequestRecord, RetrievalCandidate } from "../search/types.js";

export type ParameterResultStatus = "ok" | "failed";

export interface ParameterResultInput {
  applicationId: string;
  parameterId: string;
  status: ParameterResultStatus;
  value: string | null;
  confidence: number | null;
  method: ExtractionMethod | null;
  chunksScanned: number | null;
  searchResults: RetrievalCandidate[];
  llmRequest: LlmRequestRecord | null;
  error: string | null;
}

export interface ParameterResultRepositoryPort {
  upsert: (input: ParameterResultInput) => Promise<void>;
}

/** One row per (application, parameter); a rerun overwrites the previous answer. */
export class ParameterResultRepository implements ParameterResultRepositoryPort {
  async upsert(input: ParameterResultInput): Promise<void> {
    const { pool } = await getPostgresClient();
    await pool.query(
      `
        INSERT INTO parameter_results (
          application_id, parameter_id, status, value, confidence, method,
          chunks_scanned, search_results, llm_request, error, updated_at
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8::jsonb, $9::jsonb, $10, NOW())
        ON CONFLICT (application_id, parameter_id) DO UPDATE SET
          status = EXCLUDED.status,
          value = EXCLUDED.value,
          confidence = EXCLUDED.confidence,
          method = EXCLUDED.method,
          chunks_scanned = EXCLUDED.chunks_scanned,
          search_results = EXCLUDED.search_results,
          llm_request = EXCLUDED.llm_request,
          error = EXCLUDED.error,
          updated_at = NOW()
      `,
      [
        input.applicationId,
        input.parameterId,
        input.status,
        input.value,
        input.confidence,
        input.method,
        input.chunksScanned,
        JSON.stringify(input.searchResults),
        input.llmRequest === null ? null : JSON.stringify(input.llmRequest),
        input.error
      ]
    );
  }
}
