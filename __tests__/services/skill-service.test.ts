import { describe, it, expect, beforeEach, vi } from "vitest";
import type { DbAdapter } from "@/lib/db/adapter";
import type { Topic } from "@/lib/schemas/catalog";
import {
  absent,
  createSkill,
  deleteSkill,
  getSkill,
  listSkills,
  present,
  updateSkill,
  type ServiceResult,
  type SkillPatch,
} from "@/lib/services";
import { createTestDb } from "@/__tests__/lib/create-test-db";
import { createMockDbAdapter } from "@/__tests__/lib/mock-db-adapter";

const noChanges: SkillPatch = {
  name: absent,
  topicID: absent,
  difficulty: absent,
};

function unwrap<T>(result: ServiceResult<T>): T {
  if (!result.success) throw new Error(`expected success, got ${result.error.kind}`);
  return result.data;
}

describe("skill service", () => {
  let db: DbAdapter;
  let math: Topic;
  let art: Topic;

  beforeEach(async () => {
    db = createTestDb();
    math = await db.insertTopic({ name: "Math", description: null, parentTopicID: null });
    art = await db.insertTopic({ name: "Art", description: null, parentTopicID: null });
  });

  describe("createSkill", () => {
    it("defaults difficulty to beginner and round-trips through getSkill", async () => {
      const skill = unwrap(await createSkill(db, { name: " Addition ", topicID: math.id }));

      expect(skill).toEqual({
        id: skill.id,
        name: "Addition",
        topicID: math.id,
        difficulty: "beginner",
      });
      expect(unwrap(await getSkill(db, skill.id))).toEqual(skill);
    });

    it("treats a blank difficulty as absent and trims a given one", async () => {
      const blank = unwrap(
        await createSkill(db, { name: "Addition", topicID: math.id, difficulty: "   " })
      );
      expect(blank.difficulty).toBe("beginner");

      const given = unwrap(
        await createSkill(db, { name: "Calculus", topicID: math.id, difficulty: " advanced " })
      );
      expect(given.difficulty).toBe("advanced");
    });

    it("rejects a blank name", async () => {
      const result = await createSkill(db, { name: "  ", topicID: math.id });
      expect(result).toEqual({
        success: false,
        error: {
          kind: "validation_failed",
          message: "Field 'name' is required",
          details: { name: ["Field 'name' is required"] },
        },
      });
    });

    it.each([undefined, null, ""])("rejects the missing topicID %j", async (topicID) => {
      const result = await createSkill(db, { name: "Addition", topicID });
      expect(result.success).toBe(false);
      if (!result.success) expect(result.error.message).toBe("Field 'topicID' is required");
    });

    it("rejects a topic that does not exist", async () => {
      const result = await createSkill(db, { name: "Addition", topicID: "missing" });
      expect(result).toEqual({
        success: false,
        error: {
          kind: "validation_failed",
          message: "topicID not found",
          details: { topicID: ["topicID not found"] },
        },
      });
      expect((await listSkills(db, {})).meta.total).toBe(0);
    });
  });

  describe("getSkill", () => {
    it("reports a missing skill as not found", async () => {
      expect(await getSkill(db, "missing")).toEqual({
        success: false,
        error: { kind: "not_found", message: "Skill not found" },
      });
    });
  });

  describe("listSkills", () => {
    beforeEach(async () => {
      await createSkill(db, { name: "Subtraction", topicID: math.id });
      await createSkill(db, { name: "Addition", topicID: math.id });
      await createSkill(db, { name: "Shading", topicID: art.id });
    });

    it("orders by name and filters by topic", async () => {
      const all = await listSkills(db, {});
      expect(all.data.map((s) => s.name)).toEqual(["Addition", "Shading", "Subtraction"]);
      expect(all.meta).toEqual({ total: 3, limit: 50, offset: 0 });

      const mathOnly = await listSkills(db, { topicId: math.id });
      expect(mathOnly.data.map((s) => s.name)).toEqual(["Addition", "Subtraction"]);
      expect(mathOnly.meta.total).toBe(2);
    });

    it("combines search with the topic filter", async () => {
      const result = await listSkills(db, { q: "sh", topicId: art.id });
      expect(result.data.map((s) => s.name)).toEqual(["Shading"]);
    });

    it("clamps paging like topics", async () => {
      const result = await listSkills(db, { limit: 1000, offset: -5 });
      expect(result.meta).toEqual({ total: 3, limit: 200, offset: 0 });
    });

    it("returns the full total for a page past the end", async () => {
      const result = await listSkills(db, { limit: 2, offset: 10 });
      expect(result).toEqual({ data: [], meta: { total: 3, limit: 2, offset: 10 } });
    });
  });

  describe("updateSkill", () => {
    it("reports a missing skill as not found", async () => {
      const result = await updateSkill(db, "missing", noChanges);
      expect(result.success).toBe(false);
      if (!result.success) expect(result.error.kind).toBe("not_found");
    });

    it("changes only the fields that are present", async () => {
      const skill = unwrap(await createSkill(db, { name: "Addition", topicID: math.id }));

      const moved = unwrap(
        await updateSkill(db, skill.id, {
          ...noChanges,
          topicID: present(art.id),
          difficulty: present(" intermediate "),
        })
      );
      expect(moved).toEqual({
        id: skill.id,
        name: "Addition",
        topicID: art.id,
        difficulty: "intermediate",
      });
    });

    it("keeps the current difficulty when the new one is blank or null", async () => {
      const skill = unwrap(
        await createSkill(db, { name: "Addition", topicID: math.id, difficulty: "advanced" })
      );

      const blank = unwrap(
        await updateSkill(db, skill.id, { ...noChanges, difficulty: present("  ") })
      );
      expect(blank.difficulty).toBe("advanced");

      const nulled = unwrap(
        await updateSkill(db, skill.id, { ...noChanges, difficulty: present(null) })
      );
      expect(nulled.difficulty).toBe("advanced");
    });

    it("rejects a blank name", async () => {
      const skill = unwrap(await createSkill(db, { name: "Addition", topicID: math.id }));
      const result = await updateSkill(db, skill.id, { ...noChanges, name: present("") });

      expect(result.success).toBe(false);
      if (!result.success) expect(result.error.message).toBe("Field 'name' must not be empty");
    });

    it("rejects clearing or dangling the topic", async () => {
      const skill = unwrap(await createSkill(db, { name: "Addition", topicID: math.id }));

      const cleared = await updateSkill(db, skill.id, { ...noChanges, topicID: present(null) });
      expect(cleared.success).toBe(false);
      if (!cleared.success) expect(cleared.error.message).toBe("Field 'topicID' is required");

      const dangling = await updateSkill(db, skill.id, {
        ...noChanges,
        topicID: present("missing"),
      });
      expect(dangling.success).toBe(false);
      if (!dangling.success) expect(dangling.error.message).toBe("topicID not found");

      expect(unwrap(await getSkill(db, skill.id)).topicID).toBe(math.id);
    });

    it("re-checks the unchanged topic on every update", async () => {
      const skill = { id: "s-1", name: "Addition", topicID: "t-gone", difficulty: "beginner" };
      const getTopicMock = vi.fn().mockResolvedValue(null);
      const updateSkillMock = vi.fn();
      const mock = createMockDbAdapter({
        getSkill: vi.fn().mockResolvedValue(skill),
        getTopic: getTopicMock,
        updateSkill: updateSkillMock,
      });

      const result = await updateSkill(mock, "s-1", { ...noChanges, name: present("Sums") });

      expect(getTopicMock).toHaveBeenCalledWith("t-gone");
      expect(result.success).toBe(false);
      if (!result.success) expect(result.error.message).toBe("topicID not found");
      expect(updateSkillMock).not.toHaveBeenCalled();
    });
  });

  describe("deleteSkill", () => {
    it("deletes unconditionally and then reports not found", async () => {
      const skill = unwrap(await createSkill(db, { name: "Addition", topicID: math.id }));

      expect(unwrap(await deleteSkill(db, skill.id))).toEqual(skill);
      const again = await deleteSkill(db, skill.id);
      expect(again.success).toBe(false);
      if (!again.success) expect(again.error.kind).toBe("not_found");
    });
  });
});
