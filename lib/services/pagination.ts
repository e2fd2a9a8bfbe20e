/**
 * Shared list query contract: search term, paging defaults and clamping.
 */

import type { PageRequest } from "@/lib/schemas/catalog";

export const DEFAULT_LIMIT = 50;
export const MAX_LIMIT = 200;

export interface ListQuery {
  /** Case-insensitive name substring */
  q?: string;
  limit?: number;
  offset?: number;
}

export interface ListMeta {
  total: number;
  limit: number;
  offset: number;
}

export interface ListResult<T> {
  data: T[];
  meta: ListMeta;
}

/**
 * Limit defaults to 50 and is capped at 200; there is no lower bound, so
 * 0 or a negative limit passes through (storage returns an empty page).
 * Offset defaults to 0 and is floored at 0.
 */
export function resolvePage(query: Pick<ListQuery, "limit" | "offset">): PageRequest {
  return {
    limit: Math.min(query.limit ?? DEFAULT_LIMIT, MAX_LIMIT),
    offset: Math.max(query.offset ?? 0, 0),
  };
}
