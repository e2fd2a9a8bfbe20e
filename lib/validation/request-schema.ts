/**
 * Zod schemas for API request validation.
 * These check JSON shape only; required fields, trimming and reference
 * checks are the services' job.
 */

import * as z from "zod";

// Query strings: limit/offset must be integers the database can bind;
// the services clamp them.
const integerParam = z
  .string()
  .trim()
  .refine(
    (value) => /^-?\d+$/.test(value) && Number.isSafeInteger(Number(value)),
    "Expected an integer"
  )
  .transform(Number);

const listQueryBase = z.object({
  q: z.string().optional(),
  limit: integerParam.optional(),
  offset: integerParam.optional(),
});

export const listTopicsQuerySchema = listQueryBase.extend({
  parentId: z.string().optional(),
});

export const listSkillsQuerySchema = listQueryBase.extend({
  topicId: z.string().optional(),
});

// Topic create/update
export const createTopicSchema = z.object({
  name: z.string().nullable().optional(),
  description: z.string().nullable().optional(),
  parentTopicID: z.string().nullable().optional(),
});

export const updateTopicSchema = z.object({
  name: z.string().optional(),
  description: z.string().nullable().optional(),
  parentTopicID: z.string().nullable().optional(),
});

// Skill create/update. "topicId" is accepted as an alias of "topicID".
export const createSkillSchema = z
  .object({
    name: z.string().nullable().optional(),
    topicID: z.string().nullable().optional(),
    topicId: z.string().nullable().optional(),
    difficulty: z.string().nullable().optional(),
  })
  .transform(({ topicId, ...rest }) => ({
    ...rest,
    topicID: rest.topicID || topicId,
  }));

export const updateSkillSchema = z
  .object({
    name: z.string().optional(),
    topicID: z.string().nullable().optional(),
    topicId: z.string().nullable().optional(),
    difficulty: z.string().nullable().optional(),
  })
  .transform(({ topicId, ...rest }) => ({
    ...rest,
    topicID: rest.topicID !== undefined ? rest.topicID : topicId,
  }));
