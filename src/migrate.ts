import fs from "node:fs";
import path from "node:path";
import { PoolClient } from "pg";
import { pool } from "./db";
import { logger } from "./logger";

// Same key in every instance of this service.
const MIGRATION_LOCK_KEY = 72_100_417;

function pendingFiles(dir: string, applied: Set<string>) {
  return fs
    .readdirSync(dir)
    .filter((file) => file.endsWith(".sql"))
    .sort()
    .map((file) => ({ id: file.replace(/\.sql$/, ""), file: path.join(dir, file) }))
    .filter((entry) => !applied.has(entry.id));
}

async function applyMigration(client: PoolClient, id: string, sql: string) {
  await client.query("BEGIN");
  try {
    await client.query(sql);
    await client.query("INSERT INTO schema_migrations(id) VALUES ($1)", [id]);
    await client.query("COMMIT");
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  }
}

/**
 * Applies `migrations/*.sql` in file-name order, each in its own transaction.
 * An advisory lock keeps two instances booting together from racing.
 */
export async function runMigrations() {
  const migrationsDir = path.resolve(__dirname, "..", "migrations");
  const client = await pool.connect();
  try {
    await client.query("SELECT pg_advisory_lock($1)", [MIGRATION_LOCK_KEY]);
    await client.query(
      "CREATE TABLE IF NOT EXISTS schema_migrations (id TEXT PRIMARY KEY, run_at TIMESTAMPTZ NOT NULL DEFAULT now())",
    );
    const { rows } = await client.query<{ id: string }>("SELECT id FROM schema_migrations");
    const pending = pendingFiles(migrationsDir, new Set(rows.map((row) => row.id)));

    for (const entry of pending) {
      logger.info({ migration: entry.id }, "Applying migration");
      await applyMigration(client, entry.id, fs.readFileSync(entry.file, "utf8"));
    }
    logger.info({ applied: pending.length }, "Migrations up to date");
  } finally {
    await client.query("SELECT pg_advisory_unlock($1)", [MIGRATION_LOCK_KEY]);
    client.release();
  }
}

if (require.main === module) {
  runMigrations()
    .catch((err) => {
      logger.error({ err }, "Migration failed");
      process.exitCode = 1;
    })
    .finally(async () => {
      await pool.end();
    });
}
