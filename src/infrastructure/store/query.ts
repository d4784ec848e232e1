import type { JsonObject, JsonValue } from '../../domain/index.js';

/**
 * Query fragments understood by the document store.
 *
 * Fragments are plain tagged values; `serializeFragment` turns them into
 * the store's query DSL and `buildRequestBody` assembles a search body.
 */

export type TermValue = string | number | boolean;

/** Exact match of a single field. */
export interface TermQuery {
  readonly type: 'term';
  readonly field: string;
  readonly value: TermValue;
}

/** Lucene-syntax free-text query. */
export interface FreeTextQuery {
  readonly type: 'free_text';
  readonly text: string;
}

/** Any body, passed through untouched. Debug and one-off escape hatch. */
export interface RawQuery {
  readonly type: 'raw';
  readonly body: JsonObject;
}

/** Fragments ANDed inside a constant-score filter (no effect on scoring). */
export interface AndQuery {
  readonly type: 'and';
  readonly fragments: readonly QueryFragment[];
}

export type QueryFragment = TermQuery | FreeTextQuery | RawQuery | AndQuery;

/** Field/value pairs turned into term queries, in insertion order. */
export type FieldEquals = Readonly<Record<string, TermValue>>;

export interface SearchBody extends JsonObject {
  query: JsonObject;
}

export const MATCH_EVERYTHING = '*:*';

export function termQuery(field: string, value: TermValue): TermQuery {
  return { type: 'term', field, value };
}

export function freeTextQuery(text: string): FreeTextQuery {
  return { type: 'free_text', text };
}

export function rawQuery(body: JsonObject): RawQuery {
  return { type: 'raw', body };
}

export function andQuery(fragments: readonly QueryFragment[]): AndQuery {
  if (fragments.length === 0) {
    throw new RangeError('andQuery needs at least one fragment');
  }
  return { type: 'and', fragments };
}

export function serializeFragment(fragment: QueryFragment): JsonObject {
  switch (fragment.type) {
    case 'term':
      return { term: { [fragment.field]: fragment.value } };
    case 'free_text':
      return { query_string: { query: fragment.text } };
    case 'raw':
      return fragment.body;
    case 'and': {
      const clauses: JsonValue[] = fragment.fragments.map((child) =>
        // free-text clauses must be wrapped to sit inside a filter
        child.type === 'free_text'
          ? { query: serializeFragment(child) }
          : serializeFragment(child),
      );
      return { constant_score: { filter: { and: clauses } } };
    }
  }
}

/** Facet request block: one terms facet per field, keyed by field name. */
export function buildFacets(fields: readonly string[]): JsonObject {
  const facets: JsonObject = {};
  for (const field of fields) {
    facets[field] = { terms: { field } };
  }
  return facets;
}

/**
 * Serializes a query into a search request body.
 *
 * - A top-level raw query is returned verbatim; facets are not attached.
 * - A list is ANDed; an empty list matches every document.
 * - Requested facet fields add a `facets` block.
 */
export function buildRequestBody(
  query: QueryFragment | readonly QueryFragment[],
  facetFields: readonly string[] = [],
): JsonObject {
  if (!isFragmentList(query) && query.type === 'raw') {
    return query.body;
  }

  let serialized: JsonObject;
  if (isFragmentList(query)) {
    serialized = query.length === 0
      ? { match_all: {} }
      : serializeFragment(andQuery(query));
  } else {
    serialized = serializeFragment(query);
  }

  const body: SearchBody = { query: serialized };
  if (facetFields.length > 0) {
    body.facets = buildFacets(facetFields);
  }
  return body;
}

function isFragmentList(
  query: QueryFragment | readonly QueryFragment[],
): query is readonly QueryFragment[] {
  return Array.isArray(query);
}

/**
 * Turns a free-text string plus field/value pairs into fragments:
 * one free-text query (when text is given) followed by one term query
 * per pair, in the order the pairs were supplied.
 */
export function parseQuery(freeText?: string | null, fieldEquals: FieldEquals = {}): QueryFragment[] {
  const fragments: QueryFragment[] = [];
  if (freeText) {
    fragments.push(freeTextQuery(freeText));
  }
  for (const [field, value] of Object.entries(fieldEquals)) {
    fragments.push(termQuery(field, value));
  }
  return fragments;
}
