import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { config } from "../config/index.js";
import {
  readPayloadPath,
  type VectorStoreClient,
  type VectorStoreCondition,
  type VectorStoreFilter,
  type VectorStorePoint
} from "./vector-store.js";

const storedPointSchema = z.object({
  id: z.union([z.string(), z.number()]),
  vector: z.array(z.number()),
  payload: z.record(z.unknown()).default({})
});

const storeSchema = z.object({
  collections: z.record(z.array(storedPointSchema)).default({})
});

type StoredPoint = z.infer<typeof storedPointSchema>;
type StoreShape = z.infer<typeof storeSchema>;

const DEFAULT_LOCAL_STORE_PATH = "data/local-vector-store.json";

function resolveStorePath(configured: string | undefined): string {
  const relative = configured && configured.length > 0 ? configured : DEFAULT_LOCAL_STORE_PATH;
  return path.isAbsolute(relative)
    ? relative
    : path.resolve(process.cwd(), relative);
}

function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length === 0 || b.length === 0 || a.length !== b.length) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function matchesCondition(payload: Record<string, unknown>, condition: VectorStoreCondition): boolean {
  const value = readPayloadPath(payload, condition.key);
  if ("value" in condition.match) {
    return value === condition.match.value;
  }
  // Substring semantics, as Qdrant applies to a text match on an unindexed field.
  return typeof value === "string" && value.toLowerCase().includes(condition.match.text.toLowerCase());
}

function matchesFilter(payload: Record<string, unknown>, filter?: VectorStoreFilter): boolean {
  const must = filter?.must ?? [];
  return must.every((condition) => matchesCondition(payload, condition));
}

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && "code" in error;

async function readStore(filePath: string): Promise<StoreShape> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return { collections: {} };
    }
    throw error;
  }
  return storeSchema.parse(JSON.parse(raw));
}

const toPoint = (point: StoredPoint, score: number | null): VectorStorePoint => ({
  id: point.id,
  score,
  payload: point.payload
});

export function createLocalVectorStoreClient(storeFile: string | undefined = config.LOCAL_VECTOR_STORE_FILE): VectorStoreClient {
  const filePath = resolveStorePath(storeFile);

  const pointsOf = async (collection: string, filter?: VectorStoreFilter): Promise<StoredPoint[]> => {
    const store = await readStore(filePath);
    return (store.collections[collection] ?? []).filter((point) => matchesFilter(point.payload, filter));
  };

  return {
    async listCollections() {
      const store = await readStore(filePath);
      return Object.keys(store.collections);
    },

    async collectionExists(collection) {
      const store = await readStore(filePath);
      return Array.isArray(store.collections[collection]);
    },

    async search(collection, request) {
      const points = await pointsOf(collection, request.filter);
      // Array.prototype.sort is stable, so equal scores keep insertion order.
      return points
        .map((point) => toPoint(point, cosineSimilarity(point.vector, request.vector)))
        .sort((a, b) => (b.score ?? 0) - (a.score ?? 0))
        .slice(0, Math.max(1, request.limit));
    },

    async scroll(collection, request) {
      const points = await pointsOf(collection, request.filter);
      const start = typeof request.offset === "number" ? request.offset : 0;
      const end = start + Math.max(1, request.limit);
      return {
        points: points.slice(start, end).map((point) => toPoint(point, null)),
        nextOffset: end < points.length ? end : null
      };
    },

    async count(collection, filter) {
      const points = await pointsOf(collection, filter);
      return points.length;
    }
  };
}
