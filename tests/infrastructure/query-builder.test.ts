import { describe, it, expect } from 'vitest';
import {
  andQuery,
  buildFacets,
  buildRequestBody,
  freeTextQuery,
  parseQuery,
  rawQuery,
  serializeFragment,
  termQuery,
} from '../../src/infrastructure/store/index.js';

// ─── serializeFragment ───────────────────────────────────────

describe('serializeFragment', () => {
  it('serializes a term query', () => {
    expect(serializeFragment(termQuery('channel', '#dev'))).toEqual({ term: { channel: '#dev' } });
  });

  it('serializes a free-text query', () => {
    expect(serializeFragment(freeTextQuery('actor:alice'))).toEqual({
      query_string: { query: 'actor:alice' },
    });
  });

  it('passes raw bodies through', () => {
    const body = { match_all: {} };
    expect(serializeFragment(rawQuery(body))).toBe(body);
  });

  it('wraps free-text children of an AND in a query clause', () => {
    const query = andQuery([freeTextQuery('hello'), termQuery('actor', 'bob')]);
    expect(serializeFragment(query)).toEqual({
      constant_score: {
        filter: {
          and: [
            { query: { query_string: { query: 'hello' } } },
            { term: { actor: 'bob' } },
          ],
        },
      },
    });
  });

  it('rejects an empty AND', () => {
    expect(() => andQuery([])).toThrow(RangeError);
  });
});

// ─── parseQuery ──────────────────────────────────────────────

describe('parseQuery', () => {
  it('puts free text first, then one term per pair in order', () => {
    expect(parseQuery('hello', { channel: '#dev', actor: 'bob' })).toEqual([
      { type: 'free_text', text: 'hello' },
      { type: 'term', field: 'channel', value: '#dev' },
      { type: 'term', field: 'actor', value: 'bob' },
    ]);
  });

  it('skips empty free text', () => {
    expect(parseQuery('', { actor: 'bob' })).toEqual([{ type: 'term', field: 'actor', value: 'bob' }]);
    expect(parseQuery(null)).toEqual([]);
  });
});

// ─── buildRequestBody ────────────────────────────────────────

describe('buildRequestBody', () => {
  it('matches everything for an empty list', () => {
    expect(buildRequestBody([])).toEqual({ query: { match_all: {} } });
  });

  it('ANDs a list of fragments', () => {
    expect(buildRequestBody([termQuery('kind', 'JOIN')])).toEqual({
      query: { constant_score: { filter: { and: [{ term: { kind: 'JOIN' } }] } } },
    });
  });

  it('serializes a single fragment without wrapping', () => {
    expect(buildRequestBody(freeTextQuery('*:*'))).toEqual({ query: { query_string: { query: '*:*' } } });
  });

  it('adds one terms facet per requested field', () => {
    expect(buildRequestBody([], ['channel', 'actor'])).toEqual({
      query: { match_all: {} },
      facets: {
        channel: { terms: { field: 'channel' } },
        actor: { terms: { field: 'actor' } },
      },
    });
  });

  it('sends raw queries verbatim and ignores facets', () => {
    const body = { query: { ids: { values: ['1'] } }, size: 1 };
    expect(buildRequestBody(rawQuery(body), ['channel'])).toBe(body);
  });

  it('builds an empty facet block for no fields', () => {
    expect(buildFacets([])).toEqual({});
  });
});
