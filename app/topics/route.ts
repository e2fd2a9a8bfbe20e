import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { createTopic, listTopics } from "@/lib/services";
import {
  json,
  badRequestError,
  validationError,
  domainErrorResponse,
  internalError,
} from "@/lib/api/response-helpers";
import { readJsonBody, searchParamsToObject } from "@/lib/api/request-helpers";
import {
  createTopicSchema,
  listTopicsQuerySchema,
} from "@/lib/validation/request-schema";
import { zodErrorDetails } from "@/lib/validation/zod-details";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(request: NextRequest) {
  try {
    const parsed = listTopicsQuerySchema.safeParse(
      searchParamsToObject(request.nextUrl.searchParams)
    );
    if (!parsed.success) {
      return badRequestError("Invalid query parameters", zodErrorDetails(parsed.error));
    }

    const result = await listTopics(getDb(), parsed.data);
    return json(result);
  } catch (err) {
    console.error("GET /topics error:", err);
    return internalError();
  }
}

export async function POST(request: NextRequest) {
  try {
    const body = await readJsonBody(request);
    const parsed = createTopicSchema.safeParse(body);
    if (!parsed.success) {
      return validationError("Invalid request body", zodErrorDetails(parsed.error));
    }

    const { name, description, parentTopicID } = parsed.data;
    const result = await createTopic(getDb(), {
      name: name ?? "",
      description,
      parentTopicID,
    });
    if (!result.success) return domainErrorResponse(result.error);

    return json(result.data, 201);
  } catch (err) {
    console.error("POST /topics error:", err);
    return internalError();
  }
}
