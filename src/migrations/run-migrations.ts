import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { PoolClient } from "pg";
import { withTransaction } from "../clients/postgres.js";
import { logError, logInfo, serializeError } from "../observability/logger.js";

const currentFilePath = fileURLToPath(import.meta.url);
export const defaultMigrationsDir = path.resolve(path.dirname(currentFilePath), "../../migrations");

export const SCHEMA_MIGRATIONS_DDL = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    filename TEXT PRIMARY KEY,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )
`;

export type MigrationClient = Pick<PoolClient, "query">;

type TransactionRunner = <T>(operation: (client: MigrationClient) => Promise<T>) => Promise<T>;

export interface RunMigrationsDependencies {
  migrationsDir?: string;
  readdirFn?: (dir: string) => Promise<string[]>;
  readFileFn?: (file: string, encoding: "utf8") => Promise<string>;
  withTransactionFn?: TransactionRunner;
}

export const listMigrationFiles = async (
  migrationsDir: string,
  readdirFn: (dir: string) => Promise<string[]> = (dir) => readdir(dir)
): Promise<string[]> => (await readdirFn(migrationsDir)).filter((name) => name.endsWith(".sql")).sort();

/** Applies pending .sql files in name order, one transaction per file. */
export async function runMigrations(dependencies: RunMigrationsDependencies = {}): Promise<string[]> {
  const migrationsDir = dependencies.migrationsDir ?? defaultMigrationsDir;
  const readFileFn = dependencies.readFileFn ?? ((file: string, encoding: "utf8") => readFile(file, encoding));
  const withTransactionFn: TransactionRunner = dependencies.withTransactionFn ?? withTransaction;

  const filenames = await listMigrationFiles(migrationsDir, dependencies.readdirFn);
  if (filenames.length === 0) {
    return [];
  }

  await withTransactionFn(async (client) => {
    await client.query(SCHEMA_MIGRATIONS_DDL);
  });

  const applied: string[] = [];

  for (const filename of filenames) {
    const alreadyAppliedResult = await withTransactionFn(async (client) =>
      client.query<{ exists: boolean }>(
        "SELECT EXISTS(SELECT 1 FROM schema_migrations WHERE filename = $1) AS exists",
        [filename]
      )
    );

    if (alreadyAppliedResult.rows[0]?.exists) {
      continue;
    }

    const migrationSql = (await readFileFn(path.join(migrationsDir, filename), "utf8")).replace(/^\uFEFF/, "");

    await withTransactionFn(async (client) => {
      await client.query(migrationSql);
      await client.query("INSERT INTO schema_migrations (filename) VALUES ($1)", [filename]);
    });

    applied.push(filename);
  }

  return applied;
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  runMigrations()
    .then(async (applied) => {
      logInfo("migrations.applied", {}, { applied });
      const { shutdownPostgresClient } = await import("../clients/postgres.js");
      await shutdownPostgresClient();
    })
    .catch((error: unknown) => {
      logError("migrations.failed", {}, serializeError(error));
      process.exitCode = 1;
    });
}
