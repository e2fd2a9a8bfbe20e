/**
 * Postgres implementation of DbAdapter (hosted mode).
 * Uses the postgres client; the connection opens lazily on the first query,
 * which is also when pending migrations are applied.
 */

import postgres from "postgres";
import { randomUUID } from "node:crypto";
import type { DbAdapter } from "./adapter";
import { runPostgresMigrations } from "./migrate";
import { toSkill, toTopic, type SkillRow, type TopicRow } from "./rows";
import type { PageRequest, SkillFilter, TopicFilter } from "@/lib/schemas/catalog";

export function createPostgresAdapter(connectionString: string): DbAdapter {
  const sql = postgres(connectionString, { onnotice: () => {} });

  let ready: Promise<void> | null = null;
  function ensureReady(): Promise<void> {
    if (!ready) {
      ready = runPostgresMigrations(sql).catch((err: unknown) => {
        ready = null;
        throw err;
      });
    }
    return ready;
  }

  function topicWhere(filter: TopicFilter) {
    return sql`WHERE true
      ${filter.namePattern ? sql`AND strpos(lower(name), lower(${filter.namePattern})) > 0` : sql``}
      ${filter.parentID ? sql`AND parent_topic_id = ${filter.parentID}` : sql``}`;
  }

  function skillWhere(filter: SkillFilter) {
    return sql`WHERE true
      ${filter.namePattern ? sql`AND strpos(lower(name), lower(${filter.namePattern})) > 0` : sql``}
      ${filter.topicID ? sql`AND topic_id = ${filter.topicID}` : sql``}`;
  }

  const adapter: DbAdapter = {
    // --- Topics ---
    async getTopic(topicId: string) {
      await ensureReady();
      const rows = await sql<TopicRow[]>`
        SELECT id, name, description, parent_topic_id FROM topic WHERE id = ${topicId}`;
      return rows[0] ? toTopic(rows[0]) : null;
    },
    async listTopics(filter: TopicFilter, page: PageRequest) {
      await ensureReady();
      const [counted] = await sql<{ total: number }[]>`
        SELECT COUNT(*)::int AS total FROM topic ${topicWhere(filter)}`;
      const total = counted?.total ?? 0;
      if (page.limit <= 0) return { items: [], total };
      const rows = await sql<TopicRow[]>`
        SELECT id, name, description, parent_topic_id FROM topic ${topicWhere(filter)}
        -- byte-wise order, same as SQLite's BINARY collation
        ORDER BY name COLLATE "C" ASC, id COLLATE "C" ASC
        LIMIT ${page.limit} OFFSET ${page.offset}`;
      return { items: rows.map(toTopic), total };
    },
    async insertTopic(fields) {
      await ensureReady();
      const rows = await sql<TopicRow[]>`
        INSERT INTO topic (id, name, description, parent_topic_id)
        VALUES (${randomUUID()}, ${fields.name}, ${fields.description}, ${fields.parentTopicID})
        RETURNING id, name, description, parent_topic_id`;
      if (!rows[0]) throw new Error("INSERT INTO topic returned no row");
      return toTopic(rows[0]);
    },
    async updateTopic(topicId: string, fields) {
      await ensureReady();
      const rows = await sql<TopicRow[]>`
        UPDATE topic
        SET name = ${fields.name}, description = ${fields.description},
            parent_topic_id = ${fields.parentTopicID}, updated_at = now()
        WHERE id = ${topicId}
        RETURNING id, name, description, parent_topic_id`;
      return rows[0] ? toTopic(rows[0]) : null;
    },
    async deleteTopic(topicId: string) {
      await ensureReady();
      const result = await sql`DELETE FROM topic WHERE id = ${topicId}`;
      return result.count > 0;
    },
    async topicHasSkills(topicId: string) {
      await ensureReady();
      const [row] = await sql<{ found: boolean }[]>`
        SELECT EXISTS(SELECT 1 FROM skill WHERE topic_id = ${topicId}) AS found`;
      return row?.found === true;
    },

    // --- Skills ---
    async getSkill(skillId: string) {
      await ensureReady();
      const rows = await sql<SkillRow[]>`
        SELECT id, name, topic_id, difficulty FROM skill WHERE id = ${skillId}`;
      return rows[0] ? toSkill(rows[0]) : null;
    },
    async listSkills(filter: SkillFilter, page: PageRequest) {
      await ensureReady();
      const [counted] = await sql<{ total: number }[]>`
        SELECT COUNT(*)::int AS total FROM skill ${skillWhere(filter)}`;
      const total = counted?.total ?? 0;
      if (page.limit <= 0) return { items: [], total };
      const rows = await sql<SkillRow[]>`
        SELECT id, name, topic_id, difficulty FROM skill ${skillWhere(filter)}
        ORDER BY name COLLATE "C" ASC, id COLLATE "C" ASC
        LIMIT ${page.limit} OFFSET ${page.offset}`;
      return { items: rows.map(toSkill), total };
    },
    async insertSkill(fields) {
      await ensureReady();
      const rows = await sql<SkillRow[]>`
        INSERT INTO skill (id, name, topic_id, difficulty)
        VALUES (${randomUUID()}, ${fields.name}, ${fields.topicID}, ${fields.difficulty})
        RETURNING id, name, topic_id, difficulty`;
      if (!rows[0]) throw new Error("INSERT INTO skill returned no row");
      return toSkill(rows[0]);
    },
    async updateSkill(skillId: string, fields) {
      await ensureReady();
      const rows = await sql<SkillRow[]>`
        UPDATE skill
        SET name = ${fields.name}, topic_id = ${fields.topicID},
            difficulty = ${fields.difficulty}, updated_at = now()
        WHERE id = ${skillId}
        RETURNING id, name, topic_id, difficulty`;
      return rows[0] ? toSkill(rows[0]) : null;
    },
    async deleteSkill(skillId: string) {
      await ensureReady();
      const result = await sql`DELETE FROM skill WHERE id = ${skillId}`;
      return result.count > 0;
    },

    async close() {
      await sql.end({ timeout: 5 });
    },
  };

  return adapter;
}
