import * as z from "zod";

/**
 * Catalog entities: Topic (self-referencing hierarchy) and Skill (leaf under a Topic).
 * Field names match the JSON contract exposed by the API.
 */

export const DEFAULT_DIFFICULTY = "beginner";

export const topicSchema = z.object({
  id: z.string().uuid(),
  name: z.string().min(1),
  description: z.string().nullable(),
  parentTopicID: z.string().nullable(),
});

export const skillSchema = z.object({
  id: z.string().uuid(),
  name: z.string().min(1),
  topicID: z.string().min(1),
  difficulty: z.string().min(1).default(DEFAULT_DIFFICULTY),
});

export type Topic = z.infer<typeof topicSchema>;
export type Skill = z.infer<typeof skillSchema>;

/** Fields the storage layer writes for a topic (id is generated on insert). */
export type TopicFields = Omit<Topic, "id">;
export type SkillFields = Omit<Skill, "id">;

export interface TopicFilter {
  /** Case-insensitive substring of name */
  namePattern?: string;
  parentID?: string;
}

export interface SkillFilter {
  namePattern?: string;
  topicID?: string;
}

export interface PageRequest {
  limit: number;
  offset: number;
}

export interface Page<T> {
  items: T[];
  /** Matches ignoring limit/offset */
  total: number;
}
