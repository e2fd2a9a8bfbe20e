/**
 * Migration runners for SQLite and Postgres.
 * Tracks applied migrations in _migrations table.
 * Migrations are embedded as strings so the adapters need no files on disk.
 */

import Database from "better-sqlite3";
import type { Sql } from "postgres";

export interface Migration {
  name: string;
  sql: string;
}

export const SQLITE_MIGRATIONS: Migration[] = [
  {
    name: "001_catalog.sql",
    sql: /* sql */ `
-- Topics (self-referencing hierarchy)
CREATE TABLE IF NOT EXISTS topic (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  description TEXT,
  parent_topic_id TEXT REFERENCES topic(id) ON DELETE SET NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);
CREATE INDEX IF NOT EXISTS idx_topic_parent_topic_id ON topic(parent_topic_id);
CREATE INDEX IF NOT EXISTS idx_topic_name ON topic(name, id);

-- Skills (leaf records under a topic)
CREATE TABLE IF NOT EXISTS skill (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  topic_id TEXT NOT NULL REFERENCES topic(id) ON DELETE RESTRICT,
  difficulty TEXT NOT NULL DEFAULT 'beginner',
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);
CREATE INDEX IF NOT EXISTS idx_skill_topic_id ON skill(topic_id);
CREATE INDEX IF NOT EXISTS idx_skill_name ON skill(name, id);
`,
  },
];

export const POSTGRES_MIGRATIONS: Migration[] = [
  {
    name: "001_catalog.sql",
    sql: /* sql */ `
CREATE TABLE IF NOT EXISTS topic (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  description TEXT,
  parent_topic_id TEXT REFERENCES topic(id) ON DELETE SET NULL,
  created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
);
CREATE INDEX IF NOT EXISTS idx_topic_parent_topic_id ON topic(parent_topic_id);
CREATE INDEX IF NOT EXISTS idx_topic_name ON topic(name, id);

CREATE TABLE IF NOT EXISTS skill (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  topic_id TEXT NOT NULL REFERENCES topic(id) ON DELETE RESTRICT,
  difficulty TEXT NOT NULL DEFAULT 'beginner',
  created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
);
CREATE INDEX IF NOT EXISTS idx_skill_topic_id ON skill(topic_id);
CREATE INDEX IF NOT EXISTS idx_skill_name ON skill(name, id);
`,
  },
];

export function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  for (const migration of SQLITE_MIGRATIONS) {
    const row = db
      .prepare("SELECT 1 FROM _migrations WHERE name = ?")
      .get(migration.name);
    if (row) continue;

    db.exec(migration.sql);
    db.prepare("INSERT INTO _migrations (name) VALUES (?)").run(migration.name);
  }
}

export async function runPostgresMigrations(sql: Sql): Promise<void> {
  await sql`
    CREATE TABLE IF NOT EXISTS _migrations (
      name TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )
  `;

  for (const migration of POSTGRES_MIGRATIONS) {
    const rows = await sql`SELECT 1 FROM _migrations WHERE name = ${migration.name}`;
    if (rows.length > 0) continue;

    await sql.unsafe(migration.sql);
    await sql`INSERT INTO _migrations (name) VALUES (${migration.name})`;
  }
}
