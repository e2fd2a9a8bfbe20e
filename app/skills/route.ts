import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { createSkill, listSkills } from "@/lib/services";
import {
  json,
  badRequestError,
  validationError,
  domainErrorResponse,
  internalError,
} from "@/lib/api/response-helpers";
import { readJsonBody, searchParamsToObject } from "@/lib/api/request-helpers";
import {
  createSkillSchema,
  listSkillsQuerySchema,
} from "@/lib/validation/request-schema";
import { zodErrorDetails } from "@/lib/validation/zod-details";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(request: NextRequest) {
  try {
    const parsed = listSkillsQuerySchema.safeParse(
      searchParamsToObject(request.nextUrl.searchParams)
    );
    if (!parsed.success) {
      return badRequestError("Invalid query parameters", zodErrorDetails(parsed.error));
    }

    const result = await listSkills(getDb(), parsed.data);
    return json(result);
  } catch (err) {
    console.error("GET /skills error:", err);
    return internalError();
  }
}

export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const parsed = createSkillSchema.safeParse(body);
    if (!parsed.success) {
      return validationError("Invalid request body", zodErrorDetails(parsed.error));
    }

    const { name, topicID, difficulty } = parsed.data;
    const result = await createSkill(getDb(), {
      name: name ?? "",
      topicID,
      difficulty,
    });
    if (!result.success) return domainErrorResponse(result.error);

    return json(result.data, 201);
  } catch (err) {
    console.error("POST /skills error:", err);
    return internalError();
  }
}
