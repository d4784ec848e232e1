import { z } from 'zod';
import type { JsonObject } from '../../domain/index.js';
import { StoredDocument, StoreError, isJsonObject } from '../../domain/index.js';

/**
 * Zod schema for the envelope of a search response.
 *
 * Only the envelope is checked. `_source` stays an open object since
 * stored documents are schemaless.
 */
const hitSchema = z.object({
  _id: z.string().optional(),
  _source: z.record(z.string(), z.unknown()).default({}),
});

const searchResponseSchema = z.object({
  took: z.number().optional(),
  timed_out: z.boolean().optional(),
  hits: z.object({
    // newer stores report { value, relation }
    total: z.union([z.number(), z.object({ value: z.number() })]).default(0),
    hits: z.array(hitSchema).default([]),
  }).default({}),
  facets: z.record(
    z.string(),
    z.object({
      terms: z.array(z.object({
        term: z.union([z.string(), z.number()]),
        count: z.number(),
      })).default([]),
    }),
  ).default({}),
});

export interface FacetTerm {
  readonly term: string | number;
  readonly count: number;
}

/** Facet field → term counts, in the order the store returned them. */
export type FacetResult = Readonly<Record<string, readonly FacetTerm[]>>;

export interface ParsedSearchResponse {
  documents: StoredDocument[];
  facets: FacetResult;
  totalCount: number;
  tookMs: number | null;
  timedOut: boolean;
}

/**
 * Parses a raw search response into documents, facets and stats.
 * Throws a StoreError when the envelope does not look like a search response.
 */
export function parseSearchResponse(raw: JsonObject): ParsedSearchResponse {
  const parsed = searchResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StoreError('Unexpected search response shape', 200, raw);
  }

  const { hits, facets, took, timed_out } = parsed.data;
  const totalCount = typeof hits.total === 'number' ? hits.total : hits.total.value;

  const documents: StoredDocument[] = [];
  if (totalCount > 0) {
    for (const hit of hits.hits) {
      const source = hit._source;
      documents.push(StoredDocument.fromSource(hit._id ?? null, isJsonObject(source) ? source : {}));
    }
  }

  const facetResult: Record<string, FacetTerm[]> = {};
  for (const [field, facet] of Object.entries(facets)) {
    facetResult[field] = facet.terms.map(({ term, count }) => ({ term, count }));
  }

  return {
    documents,
    facets: facetResult,
    totalCount,
    tookMs: took ?? null,
    timedOut: timed_out ?? false,
  };
}
