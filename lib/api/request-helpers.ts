/**
 * Request parsing shared by the route handlers.
 */

/**
 * Parse the JSON body. A missing or malformed body reads as an empty
 * object, so required-field checks report what is missing.
 */
export async function readJsonBody(request: Request): Promise<unknown> {
  try {
    return await request.json();
  } catch {
    return {};
  }
}

/** First value per key; repeated keys beyond the first are ignored. */
export function searchParamsToObject(params: URLSearchParams): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of params) {
    if (!(key in out)) out[key] = value;
  }
  return out;
}
