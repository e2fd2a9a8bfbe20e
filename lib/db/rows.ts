/**
 * Row shapes shared by the SQLite and Postgres adapters, and their mapping
 * onto the API-facing entities.
 */

import type { Skill, Topic } from "@/lib/schemas/catalog";

export interface TopicRow {
  id: string;
  name: string;
  description: string | null;
  parent_topic_id: string | null;
}

export interface SkillRow {
  id: string;
  name: string;
  topic_id: string;
  difficulty: string;
}

export function toTopic(row: TopicRow): Topic {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    parentTopicID: row.parent_topic_id,
  };
}

export function toSkill(row: SkillRow): Skill {
  return {
    id: row.id,
    name: row.name,
    topicID: row.topic_id,
    difficulty: row.difficulty,
  };
}
