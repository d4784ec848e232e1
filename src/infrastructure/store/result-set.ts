import type { StoredDocument } from '../../domain/index.js';
import { InvalidQueryUsage } from '../../domain/index.js';
import type { DocumentStoreClient } from './client.js';
import type { FieldEquals, QueryFragment } from './query.js';
import { buildRequestBody, parseQuery } from './query.js';
import type { FacetResult, ParsedSearchResponse } from './response-schema.js';
import { parseSearchResponse } from './response-schema.js';

/** The index and doctype a manager or result set is bound to. */
export interface IndexTarget {
  readonly index: string;
  readonly doctype: string;
}

export interface ResultStats {
  readonly totalCount: number;
  readonly tookMs: number | null;
  readonly timedOut: boolean;
}

export const DEFAULT_PAGE_SIZE = 100;

function assertNonNegativeInteger(value: number, what: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidQueryUsage(`${what} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Lazily evaluated, chainable query over one index.
 *
 * Builder calls (`filter`, `where`, `orderBy`, `facet`, `limit`, `slice`)
 * only change the pending query and mark the set dirty. Reads (`count`,
 * `materialize`, `facets`, `stats`, `at`, async iteration) run the query
 * once when dirty and serve later reads from the cache.
 *
 * `slice` always marks the set dirty, even when the bounds are unchanged.
 */
export class LazyResultSet implements AsyncIterable<StoredDocument> {
  private readonly fragments: QueryFragment[];
  private readonly facetFields: string[] = [];
  private order: string | null = null;
  private size = DEFAULT_PAGE_SIZE;
  private offset = 0;

  private dirty = true;
  // bumped on every mutation so an in-flight refresh can tell it went stale
  private generation = 0;
  private inFlight: { generation: number; response: Promise<ParsedSearchResponse> } | null = null;
  private cache: ParsedSearchResponse | null = null;

  constructor(
    private readonly client: DocumentStoreClient,
    private readonly target: IndexTarget,
    fragments: readonly QueryFragment[] = [],
  ) {
    this.fragments = [...fragments];
  }

  get needsRefresh(): boolean {
    return this.dirty;
  }

  /** Current pagination window. */
  get window(): { offset: number; size: number } {
    return { offset: this.offset, size: this.size };
  }

  filter(freeText?: string | null, fieldEquals?: FieldEquals): this {
    return this.where(...parseQuery(freeText, fieldEquals));
  }

  where(...fragments: QueryFragment[]): this {
    this.fragments.push(...fragments);
    return this.touch();
  }

  /** Sorts by `field`. A leading `-` (or `descending`) sorts newest/largest first. */
  orderBy(field: string, descending = false): this {
    const name = field.startsWith('-') ? field.slice(1) : field;
    if (name === '') {
      throw new InvalidQueryUsage('orderBy needs a field name');
    }
    this.order = field.startsWith('-') || descending ? `-${name}` : name;
    return this.touch();
  }

  facet(fields: string | readonly string[]): this {
    const list = typeof fields === 'string' ? [fields] : fields;
    for (const field of list) {
      if (!this.facetFields.includes(field)) this.facetFields.push(field);
    }
    return this.touch();
  }

  limit(size: number): this {
    assertNonNegativeInteger(size, 'limit');
    this.size = size;
    return this.touch();
  }

  /**
   * Narrows the window like `array.slice(start, stop)` without evaluating.
   * A zero or omitted start keeps the current offset; an omitted stop keeps
   * the current size.
   */
  slice(start?: number, stop?: number): this {
    if (start !== undefined) assertNonNegativeInteger(start, 'slice start');
    if (stop !== undefined) assertNonNegativeInteger(stop, 'slice stop');

    const offset = start ? start : this.offset;
    if (stop !== undefined && stop < offset) {
      throw new InvalidQueryUsage(`slice stop ${stop} is before start ${offset}`);
    }

    this.offset = offset;
    if (stop !== undefined) this.size = stop - offset;
    return this.touch();
  }

  /**
   * Document at `position` within the current window.
   * Bad positions throw synchronously; a missing document rejects with a RangeError.
   */
  at(position: number): Promise<StoredDocument> {
    assertNonNegativeInteger(position, 'index');
    return this.materialize().then((documents) => {
      const doc = documents[position];
      if (doc === undefined) {
        throw new RangeError(`No document at index ${position} (have ${documents.length})`);
      }
      return doc;
    });
  }

  /** Total number of hits the store reports for the query. */
  async count(): Promise<number> {
    return (await this.evaluate()).totalCount;
  }

  async materialize(): Promise<readonly StoredDocument[]> {
    return (await this.evaluate()).documents;
  }

  async facets(): Promise<FacetResult> {
    return (await this.evaluate()).facets;
  }

  async stats(): Promise<ResultStats> {
    const { totalCount, tookMs, timedOut } = await this.evaluate();
    return { totalCount, tookMs, timedOut };
  }

  async *[Symbol.asyncIterator](): AsyncIterator<StoredDocument> {
    for (const doc of await this.materialize()) {
      yield doc;
    }
  }

  private touch(): this {
    this.dirty = true;
    this.generation++;
    return this;
  }

  private async evaluate(): Promise<ParsedSearchResponse> {
    if (!this.dirty && this.cache) return this.cache;
    // only join a refresh that was started for the current query
    if (this.inFlight && this.inFlight.generation === this.generation) {
      return this.inFlight.response;
    }

    const generation = this.generation;
    // a lone raw fragment is sent verbatim instead of being ANDed
    const [only] = this.fragments;
    const query = this.fragments.length === 1 && only?.type === 'raw' ? only : this.fragments;
    const body = buildRequestBody(query, this.facetFields);

    const pending = {
      generation,
      response: this.client
        .search(this.target.index, this.target.doctype, body, {
          orderBy: this.order,
          size: this.size,
          offset: this.offset,
        })
        .then(parseSearchResponse),
    };
    this.inFlight = pending;

    try {
      const result = await pending.response;
      if (generation === this.generation) {
        this.cache = result;
        this.dirty = false;
      }
      return result;
    } finally {
      if (this.inFlight === pending) this.inFlight = null;
    }
  }
}
