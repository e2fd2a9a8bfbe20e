/**
 * Database adapter factory.
 * Reads DB_DRIVER env var: "sqlite" (default) or "postgres".
 * SQLite: uses SQLITE_PATH, else TOPICS_DATA_DIR or ~/.topic-skill-service/topics.db
 * Postgres: uses DATABASE_URL (when DB_DRIVER=postgres)
 *
 * The adapter is created once and handed to the services by reference;
 * closeDb() releases it at shutdown.
 */

import type { DbAdapter } from "./adapter";
import { createSqliteAdapter } from "./sqlite-adapter";
import { createPostgresAdapter } from "./postgres-adapter";
import { getSqlitePath } from "@/lib/config/data-dir";

export type { DbAdapter } from "./adapter";

let _adapter: DbAdapter | null = null;

export function getDb(): DbAdapter {
  if (_adapter) return _adapter;

  const driver = process.env.DB_DRIVER ?? "sqlite";

  if (driver === "postgres") {
    const url = process.env.DATABASE_URL;
    if (!url) {
      throw new Error("DB_DRIVER=postgres requires DATABASE_URL to be set");
    }
    _adapter = createPostgresAdapter(url);
    return _adapter;
  }

  if (driver !== "sqlite") {
    throw new Error(
      `Unknown DB_DRIVER "${driver}". Use DB_DRIVER=sqlite (default) or DB_DRIVER=postgres.`
    );
  }

  _adapter = createSqliteAdapter(getSqlitePath());
  return _adapter;
}

export async function closeDb(): Promise<void> {
  const adapter = _adapter;
  _adapter = null;
  if (adapter) await adapter.close();
}

/** For tests: close the current adapter and swap in a fresh in-memory SQLite DB */
export async function resetDbForTesting(): Promise<DbAdapter> {
  await closeDb();
  _adapter = createSqliteAdapter(":memory:");
  return _adapter;
}
