/**
 * Database adapter interface.
 * Single seam between the topic/skill services and storage.
 * Supports SQLite (default) and Postgres.
 *
 * No business rules live here: existence checks, the delete guard and
 * pagination clamping belong to the services.
 */

import type {
  Page,
  PageRequest,
  Skill,
  SkillFields,
  SkillFilter,
  Topic,
  TopicFields,
  TopicFilter,
} from "@/lib/schemas/catalog";

export interface DbAdapter {
  // --- Topics ---
  getTopic(topicId: string): Promise<Topic | null>;
  /** Ordered by name, then id. A limit <= 0 yields no items. */
  listTopics(filter: TopicFilter, page: PageRequest): Promise<Page<Topic>>;
  insertTopic(fields: TopicFields): Promise<Topic>;
  /** Returns null when the topic does not exist. */
  updateTopic(topicId: string, fields: TopicFields): Promise<Topic | null>;
  /** Returns false when nothing was deleted. */
  deleteTopic(topicId: string): Promise<boolean>;
  topicHasSkills(topicId: string): Promise<boolean>;

  // --- Skills ---
  getSkill(skillId: string): Promise<Skill | null>;
  listSkills(filter: SkillFilter, page: PageRequest): Promise<Page<Skill>>;
  insertSkill(fields: SkillFields): Promise<Skill>;
  updateSkill(skillId: string, fields: SkillFields): Promise<Skill | null>;
  deleteSkill(skillId: string): Promise<boolean>;

  /** Release the underlying connection. */
  close(): Promise<void>;
}
