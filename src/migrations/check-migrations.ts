import { fileURLToPath } from "node:url";
import type { Pool } from "pg";
import { getPostgresClient } from "../clients/postgres.js";
import { logError, logInfo, serializeError } from "../observability/logger.js";
import { SCHEMA_MIGRATIONS_DDL, defaultMigrationsDir, listMigrationFiles } from "./run-migrations.js";

export interface CheckMigrationsDependencies {
  migrationsDir?: string;
  readdirFn?: (dir: string) => Promise<string[]>;
  getPostgresClientFn?: () => Promise<{ pool: Pick<Pool, "query"> }>;
}

export async function assertMigrationsCurrent(dependencies: CheckMigrationsDependencies = {}): Promise<void> {
  const migrationsDir = dependencies.migrationsDir ?? defaultMigrationsDir;
  const getPostgresClientFn = dependencies.getPostgresClientFn ?? getPostgresClient;
  const files = await listMigrationFiles(migrationsDir, dependencies.readdirFn);

  if (files.length === 0) {
    return;
  }

  const { pool } = await getPostgresClientFn();
  await pool.query(SCHEMA_MIGRATIONS_DDL);

  const appliedResult = await pool.query<{ filename: string }>("SELECT filename FROM schema_migrations");
  const applied = new Set(appliedResult.rows.map((row) => row.filename));

  const pending = files.filter((file) => !applied.has(file));
  if (pending.length > 0) {
    throw new Error(`Pending migrations detected: ${pending.join(", ")}. Run npm run migrate.`);
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  assertMigrationsCurrent()
    .then(() => logInfo("migrations.current", {}))
    .catch((error: unknown) => {
      logError("migrations.check.failed", {}, serializeError(error));
      process.exitCode = 1;
    });
}
