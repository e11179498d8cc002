import { getQdrantClient } from "../../clients/qdrant.js";
import { withRetries } from "../../clients/retry.js";
import {
  readPayloadPath,
  type PointId,
  type ScrollPage,
  type VectorStoreClient,
  type VectorStoreFilter,
  type VectorStorePoint
} from "../../clients/vector-store.js";
import { config } from "../../config/index.js";
import { RetrievalUnavailableError } from "./errors.js";

const APPLICATION_KEY = "metadata.application_id";
const TEXT_KEY = "page_content";
const SCROLL_PAGE_SIZE = 256;
const TEXT_SCORE_STEP = 0.05;
const TEXT_SCORE_FLOOR = 0.1;

/** One indexed chunk as stored in the collection payload. */
export interface ChunkRecord {
  chunk_id: string;
  document_id: string;
  chunk_index: number | null;
  page_number: number | null;
  section: string | null;
  content_type: string | null;
  text: string;
}

export interface ChunkHit {
  chunk: ChunkRecord;
  score: number;
}

export interface ChunkIndex {
  vectorSearch: (applicationId: string, vector: number[], k: number) => Promise<ChunkHit[]>;
  textSearch: (applicationId: string, query: string, k: number) => Promise<ChunkHit[]>;
  /** Every chunk of the application, ordered by document then chunk position. */
  listChunks: (applicationId: string) => Promise<ChunkRecord[]>;
  countChunks: (applicationId: string) => Promise<number>;
}

export interface ChunkIndexDependencies {
  getStore?: () => Promise<{ client: VectorStoreClient; collection: string }>;
  retries?: number;
  retryDelayMs?: number;
}

const readString = (payload: Record<string, unknown>, key: string): string | null => {
  const value = readPayloadPath(payload, key);
  if (typeof value === "string" && value.trim().length > 0) {
    return value;
  }
  if (typeof value === "number") {
    return String(value);
  }
  return null;
};

const readInteger = (payload: Record<string, unknown>, key: string): number | null => {
  const value = readPayloadPath(payload, key);
  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    return Number(value.trim());
  }
  return null;
};

export const toChunkRecord = (point: VectorStorePoint): ChunkRecord => {
  const payload = point.payload;
  const documentId = readString(payload, "metadata.document_id") ?? "unknown";
  const chunkIndex = readInteger(payload, "metadata.chunk_index");
  return {
    chunk_id: readString(payload, "metadata.chunk_id") ?? String(point.id),
    document_id: documentId,
    chunk_index: chunkIndex,
    page_number: readInteger(payload, "metadata.page_number"),
    section: readString(payload, "metadata.section"),
    content_type: readString(payload, "metadata.content_type"),
    text: readString(payload, TEXT_KEY) ?? ""
  };
};

/** Lexical hits carry rank-based scores: 1, 0.95, 0.9, ... never below 0.1. */
export const positionalTextScore = (position: number): number =>
  Math.max(TEXT_SCORE_FLOOR, Math.round((1 - TEXT_SCORE_STEP * position) * 1000) / 1000);

const applicationFilter = (applicationId: string): VectorStoreFilter => ({
  must: [{ key: APPLICATION_KEY, match: { value: applicationId } }]
});

const compareDocumentOrder = (a: ChunkRecord, b: ChunkRecord): number => {
  if (a.document_id !== b.document_id) {
    return a.document_id < b.document_id ? -1 : 1;
  }
  const left = a.chunk_index ?? Number.MAX_SAFE_INTEGER;
  const right = b.chunk_index ?? Number.MAX_SAFE_INTEGER;
  return left - right;
};

export const createChunkIndex = (dependencies?: ChunkIndexDependencies): ChunkIndex => {
  const getStore = dependencies?.getStore ?? getQdrantClient;
  const retryOptions = {
    retries: dependencies?.retries ?? config.EXTERNAL_CALL_RETRIES,
    delayMs: dependencies?.retryDelayMs ?? config.EXTERNAL_CALL_RETRY_DELAY_MS
  };

  const call = async <T>(
    operationName: string,
    operation: (client: VectorStoreClient, collection: string) => Promise<T>
  ): Promise<T> => {
    try {
      const { client, collection } = await getStore();
      return await withRetries(() => operation(client, collection), retryOptions);
    } catch (error) {
      const message = error instanceof Error ? error.message : "unknown vector store error";
      throw new RetrievalUnavailableError(`Vector store ${operationName} failed: ${message}`, { cause: error });
    }
  };

  return {
    async vectorSearch(applicationId, vector, k) {
      const points = await call("search", (client, collection) =>
        client.search(collection, { vector, limit: k, filter: applicationFilter(applicationId) })
      );
      return points.map((point) => ({ chunk: toChunkRecord(point), score: point.score ?? 0 }));
    },

    async textSearch(applicationId, query, k) {
      const page = await call("text search", (client, collection) =>
        client.scroll(collection, {
          limit: k,
          filter: {
            must: [...applicationFilter(applicationId).must, { key: TEXT_KEY, match: { text: query } }]
          }
        })
      );
      return page.points.map((point, index) => ({
        chunk: toChunkRecord(point),
        score: positionalTextScore(index)
      }));
    },

    async listChunks(applicationId) {
      const chunks: ChunkRecord[] = [];
      let offset: PointId | null = null;
      do {
        const currentOffset: PointId | null = offset;
        const page: ScrollPage = await call("scroll", (client, collection) =>
          client.scroll(collection, {
            limit: SCROLL_PAGE_SIZE,
            filter: applicationFilter(applicationId),
            offset: currentOffset
          })
        );
        chunks.push(...page.points.map(toChunkRecord));
        offset = page.nextOffset;
      } while (offset !== null);

      return chunks.sort(compareDocumentOrder);
    },

    async countChunks(applicationId) {
      return call("count", (client, collection) => client.count(collection, applicationFilter(applicationId)));
    }
  };
};
