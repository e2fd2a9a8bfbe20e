/**
 * SQLite implementation of DbAdapter.
 * Uses better-sqlite3; calls are synchronous underneath and wrapped as async
 * so callers stay backend-agnostic.
 */

import Database from "better-sqlite3";
import { randomUUID } from "node:crypto";
import type { DbAdapter } from "./adapter";
import { runMigrations } from "./migrate";
import { toSkill, toTopic, type SkillRow, type TopicRow } from "./rows";
import type { PageRequest, SkillFilter, TopicFilter } from "@/lib/schemas/catalog";

type BindValue = string | number | null;

interface WhereClause {
  sql: string;
  params: BindValue[];
}

function buildWhere(conditions: Array<[string, BindValue]>): WhereClause {
  if (conditions.length === 0) return { sql: "", params: [] };
  return {
    sql: `WHERE ${conditions.map(([c]) => c).join(" AND ")}`,
    params: conditions.map(([, v]) => v),
  };
}

// instr() matches the pattern literally; no LIKE wildcard escaping needed.
// fold() is registered per connection: SQLite's lower() only folds ASCII.
const NAME_CONTAINS = "instr(fold(name), fold(?)) > 0";

function topicWhere(filter: TopicFilter): WhereClause {
  const conditions: Array<[string, BindValue]> = [];
  if (filter.namePattern) conditions.push([NAME_CONTAINS, filter.namePattern]);
  if (filter.parentID) conditions.push(["parent_topic_id = ?", filter.parentID]);
  return buildWhere(conditions);
}

function skillWhere(filter: SkillFilter): WhereClause {
  const conditions: Array<[string, BindValue]> = [];
  if (filter.namePattern) conditions.push([NAME_CONTAINS, filter.namePattern]);
  if (filter.topicID) conditions.push(["topic_id = ?", filter.topicID]);
  return buildWhere(conditions);
}

export function createSqliteAdapter(dbPath: string | ":memory:"): DbAdapter {
  const db = new Database(dbPath);
  db.pragma("foreign_keys = ON");
  db.function("fold", { deterministic: true }, (value: unknown) =>
    String(value).toLowerCase()
  );
  runMigrations(db);

  function selectTopic(topicId: string): TopicRow | undefined {
    return db
      .prepare<[string], TopicRow>(
        "SELECT id, name, description, parent_topic_id FROM topic WHERE id = ?"
      )
      .get(topicId);
  }

  function selectSkill(skillId: string): SkillRow | undefined {
    return db
      .prepare<[string], SkillRow>(
        "SELECT id, name, topic_id, difficulty FROM skill WHERE id = ?"
      )
      .get(skillId);
  }

  function count(table: "topic" | "skill", where: WhereClause): number {
    const row = db
      .prepare<BindValue[], { total: number }>(
        `SELECT COUNT(*) AS total FROM ${table} ${where.sql}`
      )
      .get(...where.params);
    return row?.total ?? 0;
  }

  const adapter: DbAdapter = {
    // --- Topics ---
    async getTopic(topicId: string) {
      const row = selectTopic(topicId);
      return row ? toTopic(row) : null;
    },
    async listTopics(filter: TopicFilter, page: PageRequest) {
      const where = topicWhere(filter);
      const total = count("topic", where);
      if (page.limit <= 0) return { items: [], total };
      const rows = db
        .prepare<BindValue[], TopicRow>(
          `SELECT id, name, description, parent_topic_id FROM topic ${where.sql}
           ORDER BY name ASC, id ASC LIMIT ? OFFSET ?`
        )
        .all(...where.params, page.limit, page.offset);
      return { items: rows.map(toTopic), total };
    },
    async insertTopic(fields) {
      const id = randomUUID();
      const now = new Date().toISOString();
      db.prepare(
        "INSERT INTO topic (id, name, description, parent_topic_id, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?)"
      ).run(id, fields.name, fields.description, fields.parentTopicID, now, now);
      const row = selectTopic(id);
      return row ? toTopic(row) : { id, ...fields };
    },
    async updateTopic(topicId: string, fields) {
      const r = db
        .prepare(
          "UPDATE topic SET name = ?, description = ?, parent_topic_id = ?, updated_at = ? WHERE id = ?"
        )
        .run(
          fields.name,
          fields.description,
          fields.parentTopicID,
          new Date().toISOString(),
          topicId
        );
      if (r.changes === 0) return null;
      const row = selectTopic(topicId);
      return row ? toTopic(row) : null;
    },
    async deleteTopic(topicId: string) {
      const r = db.prepare("DELETE FROM topic WHERE id = ?").run(topicId);
      return r.changes > 0;
    },
    async topicHasSkills(topicId: string) {
      const row = db
        .prepare<[string], { found: number }>(
          "SELECT EXISTS(SELECT 1 FROM skill WHERE topic_id = ?) AS found"
        )
        .get(topicId);
      return row?.found === 1;
    },

    // --- Skills ---
    async getSkill(skillId: string) {
      const row = selectSkill(skillId);
      return row ? toSkill(row) : null;
    },
    async listSkills(filter: SkillFilter, page: PageRequest) {
      const where = skillWhere(filter);
      const total = count("skill", where);
      if (page.limit <= 0) return { items: [], total };
      const rows = db
        .prepare<BindValue[], SkillRow>(
          `SELECT id, name, topic_id, difficulty FROM skill ${where.sql}
           ORDER BY name ASC, id ASC LIMIT ? OFFSET ?`
        )
        .all(...where.params, page.limit, page.offset);
      return { items: rows.map(toSkill), total };
    },
    async insertSkill(fields) {
      const id = randomUUID();
      const now = new Date().toISOString();
      db.prepare(
        "INSERT INTO skill (id, name, topic_id, difficulty, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?)"
      ).run(id, fields.name, fields.topicID, fields.difficulty, now, now);
      const row = selectSkill(id);
      return row ? toSkill(row) : { id, ...fields };
    },
    async updateSkill(skillId: string, fields) {
      const r = db
        .prepare(
          "UPDATE skill SET name = ?, topic_id = ?, difficulty = ?, updated_at = ? WHERE id = ?"
        )
        .run(
          fields.name,
          fields.topicID,
          fields.difficulty,
          new Date().toISOString(),
          skillId
        );
      if (r.changes === 0) return null;
      const row = selectSkill(skillId);
      return row ? toSkill(row) : null;
    },
    async deleteSkill(skillId: string) {
      const r = db.prepare("DELETE FROM skill WHERE id = ?").run(skillId);
      return r.changes > 0;
    },

    async close() {
      if (db.open) db.close();
    },
  };

  return adapter;
}
