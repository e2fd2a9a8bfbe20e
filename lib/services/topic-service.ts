/**
 * Topic service: parent existence, cycle prevention, and the delete guard
 * that keeps skills from being orphaned.
 */

import type { DbAdapter } from "@/lib/db/adapter";
import type { Topic } from "@/lib/schemas/catalog";
import { resolvePage, type ListQuery, type ListResult } from "./pagination";
import { resolve, type Presence } from "./presence";
import {
  conflict,
  notFound,
  ok,
  validationFailed,
  type ServiceResult,
} from "./result";

export interface TopicListQuery extends ListQuery {
  parentId?: string;
}

export interface CreateTopicInput {
  name: string;
  description?: string | null;
  parentTopicID?: string | null;
}

export interface TopicPatch {
  name: Presence<string>;
  description: Presence<string | null>;
  parentTopicID: Presence<string | null>;
}

export async function listTopics(
  db: DbAdapter,
  query: TopicListQuery
): Promise<ListResult<Topic>> {
  const page = resolvePage(query);
  const { items, total } = await db.listTopics(
    { namePattern: query.q || undefined, parentID: query.parentId || undefined },
    page
  );
  return { data: items, meta: { total, ...page } };
}

export async function getTopic(
  db: DbAdapter,
  topicId: string
): Promise<ServiceResult<Topic>> {
  const topic = await db.getTopic(topicId);
  return topic ? ok(topic) : notFound("Topic not found");
}

export async function createTopic(
  db: DbAdapter,
  input: CreateTopicInput
): Promise<ServiceResult<Topic>> {
  const name = input.name.trim();
  if (!name) {
    return validationFailed("Field 'name' is required", "name");
  }

  const parentTopicID = input.parentTopicID || null;
  if (parentTopicID && !(await db.getTopic(parentTopicID))) {
    return validationFailed("parentTopicID not found", "parentTopicID");
  }

  const topic = await db.insertTopic({
    name,
    description: input.description ?? null,
    parentTopicID,
  });
  return ok(topic);
}

/**
 * Walks up from the proposed parent. Reaching topicId means the topic
 * would become its own ancestor.
 */
async function wouldCreateCycle(
  db: DbAdapter,
  topicId: string,
  parent: Topic
): Promise<boolean> {
  const seen = new Set<string>();
  let cursor: Topic | null = parent;
  while (cursor) {
    if (cursor.id === topicId) return true;
    // A pre-existing loop above us that does not include topicId.
    if (seen.has(cursor.id)) return false;
    seen.add(cursor.id);
    cursor = cursor.parentTopicID ? await db.getTopic(cursor.parentTopicID) : null;
  }
  return false;
}

/**
 * Partial update. The resolved parent is re-checked on every write, even
 * when the patch leaves it untouched.
 */
export async function updateTopic(
  db: DbAdapter,
  topicId: string,
  patch: TopicPatch
): Promise<ServiceResult<Topic>> {
  const existing = await db.getTopic(topicId);
  if (!existing) return notFound("Topic not found");

  const name = patch.name.present ? patch.name.value.trim() : existing.name;
  if (!name) {
    return validationFailed("Field 'name' must not be empty", "name");
  }

  const parentTopicID = resolve(patch.parentTopicID, existing.parentTopicID) || null;
  if (parentTopicID) {
    const parent = await db.getTopic(parentTopicID);
    if (!parent) {
      return validationFailed("parentTopicID not found", "parentTopicID");
    }
    if (await wouldCreateCycle(db, topicId, parent)) {
      return validationFailed("parentTopicID would create a cycle", "parentTopicID");
    }
  }

  const updated = await db.updateTopic(topicId, {
    name,
    description: resolve(patch.description, existing.description),
    parentTopicID,
  });
  return updated ? ok(updated) : notFound("Topic not found");
}

export async function deleteTopic(
  db: DbAdapter,
  topicId: string
): Promise<ServiceResult<Topic>> {
  const existing = await db.getTopic(topicId);
  if (!existing) return notFound("Topic not found");

  if (await db.topicHasSkills(topicId)) {
    return conflict("Topic has skills; move or delete skills first");
  }

  const deleted = await db.deleteTopic(topicId);
  return deleted ? ok(existing) : notFound("Topic not found");
}
