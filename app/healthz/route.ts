import { json } from "@/lib/api/response-helpers";

export const dynamic = "force-dynamic";

/** Liveness only; does not touch the database. */
export async function GET() {
  return json({ status: "ok" });
}
