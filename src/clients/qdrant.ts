import { QdrantClient } from "@qdrant/js-client-rest";
import { config, isLocalFileVectorStore } from "../config/index.js";
import { createLocalVectorStoreClient } from "./local-vector-store.js";
import { withRetries } from "./retry.js";
import type { PointId, VectorStoreClient, VectorStorePoint } from "./vector-store.js";

type HealthStatus = "ok" | "error";

export interface QdrantSingleton {
  client: VectorStoreClient;
  collection: string;
  healthCheck: () => Promise<{ status: HealthStatus; details?: string }>;
}

const REQUEST_TIMEOUT_MS = 5000;
const STARTUP_RETRIES = 3;
const STARTUP_RETRY_DELAY_MS = 250;

let singleton: QdrantSingleton | null = null;
let initPromise: Promise<QdrantSingleton> | null = null;

const toPointId = (value: unknown): PointId | null =>
  typeof value === "string" || typeof value === "number" ? value : null;

const toPoint = (point: { id: PointId; score?: number; payload?: Record<string, unknown> | null }): VectorStorePoint => ({
  id: point.id,
  score: typeof point.score === "number" ? point.score : null,
  payload: point.payload ?? {}
});

export function createQdrantVectorStoreClient(client: QdrantClient): VectorStoreClient {
  return {
    async listCollections() {
      const response = await client.getCollections();
      return response.collections.map((collection) => collection.name);
    },
    async collectionExists(collection) {
      const response = await client.collectionExists(collection);
      return response.exists;
    },
    async search(collection, request) {
      const points = await client.search(collection, {
        vector: request.vector,
        limit: request.limit,
        filter: request.filter,
        with_payload: true,
        with_vector: false
      });
      return points.map(toPoint);
    },
    async scroll(collection, request) {
      const page = await client.scroll(collection, {
        filter: request.filter,
        limit: request.limit,
        offset: request.offset ?? undefined,
        with_payload: true,
        with_vector: false
      });
      return {
        points: page.points.map(toPoint),
        nextOffset: toPointId(page.next_page_offset)
      };
    },
    async count(collection, filter) {
      const response = await client.count(collection, { filter, exact: true });
      return response.count;
    }
  };
}

async function initialize(): Promise<QdrantSingleton> {
  const collection = config.QDRANT_COLLECTION;

  if (isLocalFileVectorStore() || !config.QDRANT_URL) {
    const localClient = createLocalVectorStoreClient();
    console.info("[clients/qdrant] initialized singleton (local file vector store)");
    return {
      client: localClient,
      collection,
      async healthCheck() {
        try {
          await localClient.listCollections();
          return { status: "ok", details: "local file vector store" };
        } catch (error) {
          const details = error instanceof Error ? error.message : "unknown error";
          return { status: "error", details };
        }
      }
    };
  }

  const rawClient = new QdrantClient({
    url: config.QDRANT_URL,
    apiKey: config.QDRANT_API_KEY,
    timeout: REQUEST_TIMEOUT_MS
  });

  await withRetries(
    async () => {
      await rawClient.getCollections();
    },
    { retries: STARTUP_RETRIES, delayMs: STARTUP_RETRY_DELAY_MS }
  );

  console.info("[clients/qdrant] initialized singleton");

  const client = createQdrantVectorStoreClient(rawClient);
  return {
    client,
    collection,
    async healthCheck() {
      try {
        const exists = await client.collectionExists(collection);
        return exists ? { status: "ok" } : { status: "error", details: `collection ${collection} not found` };
      } catch (error) {
        const details = error instanceof Error ? error.message : "unknown error";
        return { status: "error", details };
      }
    }
  };
}

export async function getQdrantClient(): Promise<QdrantSingleton> {
  if (singleton) {
    return singleton;
  }

  if (!initPromise) {
    initPromise = initialize().catch((error: unknown) => {
      initPromise = null;
      throw error;
    });
  }

  singleton = await initPromise;
  return singleton;
}

export async function shutdownQdrantClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  initPromise = null;
  console.info("[clients/qdrant] shutdown complete");
}

export function resetQdrantClientForTests(): void {
  singleton = null;
  initPromise = null;
}
