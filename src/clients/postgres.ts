import pg from "pg";
import type { Pool, PoolClient } from "pg";
import { config } from "../config/index.js";
import { withRetries } from "./retry.js";

type HealthStatus = "ok" | "error";

export interface PostgresSingleton {
  pool: Pool;
  healthCheck: () => Promise<{ status: HealthStatus; details?: string }>;
}

const STARTUP_RETRIES = 3;
const STARTUP_RETRY_DELAY_MS = 250;
const CONNECT_TIMEOUT_MS = 5000;

let singleton: PostgresSingleton | null = null;
let initPromise: Promise<PostgresSingleton> | null = null;

async function initialize(): Promise<PostgresSingleton> {
  const pool = new pg.Pool({
    connectionString: config.POSTGRES_URL,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: CONNECT_TIMEOUT_MS
  });

  try {
    await withRetries(
      async () => {
        await pool.query("SELECT 1");
      },
      { retries: STARTUP_RETRIES, delayMs: STARTUP_RETRY_DELAY_MS }
    );
  } catch (error) {
    await pool.end().catch((endError: unknown) => {
      console.warn("[clients/postgres] failed to close pool after startup failure", endError);
    });
    throw error;
  }

  console.info("[clients/postgres] initialized singleton");

  return {
    pool,
    async healthCheck() {
      try {
        await pool.query("SELECT 1");
        return { status: "ok" };
      } catch (error) {
        const details = error instanceof Error ? error.message : "unknown error";
        return { status: "error", details };
      }
    }
  };
}

export async function getPostgresClient(): Promise<PostgresSingleton> {
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

export async function shutdownPostgresClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  await singleton.pool.end();
  singleton = null;
  initPromise = null;
  console.info("[clients/postgres] shutdown complete");
}

export async function withTransaction<T>(operation: (client: PoolClient) => Promise<T>): Promise<T> {
  const { pool } = await getPostgresClient();
  const client = await pool.connect();

  try {
    await client.query("BEGIN");
    const result = await operation(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }
}

export function resetPostgresClientForTests(): void {
  singleton = null;
  initPromise = null;
}
