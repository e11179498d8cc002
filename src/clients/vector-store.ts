export type PointId = string | number;

export type VectorStoreCondition =
  | { key: string; match: { value: string } }
  | { key: string; match: { text: string } };

export interface VectorStoreFilter {
  must: VectorStoreCondition[];
}

export interface VectorStorePoint {
  id: PointId;
  score: number | null;
  payload: Record<string, unknown>;
}

export interface VectorSearchRequest {
  vector: number[];
  limit: number;
  filter?: VectorStoreFilter;
}

export interface ScrollRequest {
  limit: number;
  filter?: VectorStoreFilter;
  offset?: PointId | null;
}

export interface ScrollPage {
  points: VectorStorePoint[];
  nextOffset: PointId | null;
}

/**
 * Operations the retrieval layer needs from a vector index. Implemented by
 * the Qdrant adapter and by the file-backed store used in local mode.
 */
export interface VectorStoreClient {
  listCollections: () => Promise<string[]>;
  collectionExists: (collection: string) => Promise<boolean>;
  search: (collection: string, request: VectorSearchRequest) => Promise<VectorStorePoint[]>;
  scroll: (collection: string, request: ScrollRequest) => Promise<ScrollPage>;
  count: (collection: string, filter?: VectorStoreFilter) => Promise<number>;
}

export const readPayloadPath = (payload: Record<string, unknown>, key: string): unknown => {
  let current: unknown = payload;
  for (const segment of key.split(".")) {
    if (!current || typeof current !== "object" || Array.isArray(current)) {
      return undefined;
    }
    current = Reflect.get(current, segment);
  }
  return current;
};
