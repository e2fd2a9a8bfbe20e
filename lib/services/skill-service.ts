/**
 * Skill service: every write requires the referenced topic to exist.
 */

import type { DbAdapter } from "@/lib/db/adapter";
import { DEFAULT_DIFFICULTY, type Skill } from "@/lib/schemas/catalog";
import { resolvePage, type ListQuery, type ListResult } from "./pagination";
import type { Presence } from "./presence";
import { notFound, ok, validationFailed, type ServiceResult } from "./result";

export interface SkillListQuery extends ListQuery {
  topicId?: string;
}

export interface CreateSkillInput {
  name: string;
  topicID?: string | null;
  difficulty?: string | null;
}

export interface SkillPatch {
  name: Presence<string>;
  topicID: Presence<string | null>;
  difficulty: Presence<string | null>;
}

export async function listSkills(
  db: DbAdapter,
  query: SkillListQuery
): Promise<ListResult<Skill>> {
  const page = resolvePage(query);
  const { items, total } = await db.listSkills(
    { namePattern: query.q || undefined, topicID: query.topicId || undefined },
    page
  );
  return { data: items, meta: { total, ...page } };
}

export async function getSkill(
  db: DbAdapter,
  skillId: string
): Promise<ServiceResult<Skill>> {
  const skill = await db.getSkill(skillId);
  return skill ? ok(skill) : notFound("Skill not found");
}

export async function createSkill(
  db: DbAdapter,
  input: CreateSkillInput
): Promise<ServiceResult<Skill>> {
  const name = input.name.trim();
  if (!name) {
    return validationFailed("Field 'name' is required", "name");
  }

  const topicID = input.topicID;
  if (!topicID) {
    return validationFailed("Field 'topicID' is required", "topicID");
  }
  if (!(await db.getTopic(topicID))) {
    return validationFailed("topicID not found", "topicID");
  }

  const skill = await db.insertSkill({
    name,
    topicID,
    difficulty: input.difficulty?.trim() || DEFAULT_DIFFICULTY,
  });
  return ok(skill);
}

/**
 * Partial update. The resolved topicID is looked up on every write, changed
 * or not. An empty difficulty keeps the current one.
 */
export async function updateSkill(
  db: DbAdapter,
  skillId: string,
  patch: SkillPatch
): Promise<ServiceResult<Skill>> {
  const existing = await db.getSkill(skillId);
  if (!existing) return notFound("Skill not found");

  const name = patch.name.present ? patch.name.value.trim() : existing.name;
  if (!name) {
    return validationFailed("Field 'name' must not be empty", "name");
  }

  const topicID = patch.topicID.present ? patch.topicID.value : existing.topicID;
  if (!topicID) {
    return validationFailed("Field 'topicID' is required", "topicID");
  }
  if (!(await db.getTopic(topicID))) {
    return validationFailed("topicID not found", "topicID");
  }

  const difficulty = patch.difficulty.present
    ? patch.difficulty.value?.trim() || existing.difficulty
    : existing.difficulty;

  const updated = await db.updateSkill(skillId, { name, topicID, difficulty });
  return updated ? ok(updated) : notFound("Skill not found");
}

export async function deleteSkill(
  db: DbAdapter,
  skillId: string
): Promise<ServiceResult<Skill>> {
  const existing = await db.getSkill(skillId);
  if (!existing) return notFound("Skill not found");

  const deleted = await db.deleteSkill(skillId);
  return deleted ? ok(existing) : notFound("Skill not found");
}
