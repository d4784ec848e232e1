import type { ChatEvent } from '../domain/index.js';
import { documentToEvent } from '../domain/index.js';
import type { DocumentManager, FacetResult } from '../infrastructure/store/index.js';

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 500;

/** Facets returned with every search. */
export const SEARCH_FACETS = ['channel', 'actor'] as const;

export interface SearchEventsParams {
  search?: string;
  channel?: string;
  user?: string;
  limit?: number;
  offset?: number;
}

export interface SearchEventsResult {
  total: number;
  took_ms: number | null;
  timed_out: boolean;
  documents: ChatEvent[];
  facets: FacetResult;
  pagination: { limit: number; offset: number; count: number };
}

/**
 * Use case: search recorded events, newest first, with channel and
 * actor facets. No search text and no filters lists everything.
 * Clamps limit to [1, 500], defaults to 50.
 */
export async function searchEvents(
  documents: Pick<DocumentManager, 'filter' | 'all'>,
  params: SearchEventsParams,
): Promise<SearchEventsResult> {
  const limit = Math.min(Math.max(params.limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT);
  const offset = Math.max(params.offset ?? 0, 0);

  const fieldEquals: Record<string, string> = {};
  if (params.channel !== undefined) fieldEquals['channel'] = params.channel;
  if (params.user !== undefined) fieldEquals['actor'] = params.user;

  const hasQuery = params.search !== undefined || Object.keys(fieldEquals).length > 0;
  const results = (hasQuery ? documents.filter(params.search, fieldEquals) : documents.all())
    .orderBy('-time')
    .facet(SEARCH_FACETS)
    .slice(offset, offset + limit);

  const [hits, facets, stats] = await Promise.all([
    results.materialize(),
    results.facets(),
    results.stats(),
  ]);

  const events: ChatEvent[] = [];
  for (const doc of hits) {
    const event = documentToEvent(doc);
    if (event) events.push(event);
  }

  return {
    total: stats.totalCount,
    took_ms: stats.tookMs,
    timed_out: stats.timedOut,
    documents: events,
    facets,
    pagination: { limit, offset, count: events.length },
  };
}
