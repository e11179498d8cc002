import { assertMigrationsCurrent } from "../migrations/check-migrations.js";

export async function runStartupChecks(rawFlag: string | undefined = process.env.RUN_STARTUP_CHECKS): Promise<void> {
  if (rawFlag !== "true") {
    return;
  }

  await assertMigrationsCurrent();
}
