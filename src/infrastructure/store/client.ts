import type { Logger } from 'pino';
import type { JsonObject, JsonValue } from '../../domain/index.js';
import { isJsonObject, NoNodesAvailable, StoreError, TransportError } from '../../domain/index.js';
import { JsonCodec } from './json-codec.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type UrlParams = Readonly<Record<string, string | number>>;

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface StoreClientOptions {
  /** Node addresses, `host:port` or full `http(s)://host:port` URLs. */
  nodes: readonly string[];
  log: Logger;
  /** Per-attempt timeout in milliseconds. */
  timeoutMs?: number;
  /** Nodes tried per request before giving up. Values < 1 mean "all nodes". */
  attemptLimit?: number;
  fetch?: FetchLike;
  codec?: JsonCodec;
}

export interface SearchOptions {
  /** Field name; a leading `-` sorts descending. */
  orderBy?: string | null;
  size?: number | null;
  offset?: number | null;
}

export const DEFAULT_TIMEOUT_MS = 10_000;

function normalizeNode(address: string): string {
  const trimmed = address.trim().replace(/\/+$/, '');
  return /^https?:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
}

/** `-time` → `time:desc`, `time` → `time:asc`. */
export function toSortParam(orderBy: string): string {
  return orderBy.startsWith('-')
    ? `${orderBy.slice(1)}:desc`
    : `${orderBy}:asc`;
}

function describeStoreError(error: JsonValue): string {
  if (typeof error === 'string') return error;
  if (isJsonObject(error)) {
    const reason = error['reason'];
    const type = error['type'];
    if (typeof reason === 'string') {
      return typeof type === 'string' ? `${type}: ${reason}` : reason;
    }
  }
  return JSON.stringify(error);
}

/**
 * HTTP client for an Elasticsearch-compatible document store cluster.
 *
 * Every request ranks the nodes by failure score (fewest failures first,
 * configured order breaking ties) and walks down that list until one node
 * answers. Transport failures cost the node one point and move on to the
 * next node; a store-reported `error` is raised straight away.
 */
export class DocumentStoreClient {
  private readonly scores = new Map<string, number>();
  private readonly attemptLimit: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly codec: JsonCodec;
  private readonly log: Logger;

  constructor(options: StoreClientOptions) {
    if (options.nodes.length === 0) {
      throw new RangeError('DocumentStoreClient needs at least one node');
    }

    for (const node of options.nodes) {
      this.scores.set(normalizeNode(node), 0);
    }

    const limit = options.attemptLimit ?? 0;
    this.attemptLimit = limit < 1 ? this.scores.size : Math.min(limit, this.scores.size);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.codec = options.codec ?? new JsonCodec();
    this.log = options.log;
  }

  /** Snapshot of the node table: address → failure score. */
  nodeScores(): ReadonlyMap<string, number> {
    return new Map(this.scores);
  }

  /** Nodes in the order the next request will try them. */
  rankedNodes(): string[] {
    // Array#sort is stable, so equal scores keep configured order
    return [...this.scores.keys()].sort(
      (a, b) => (this.scores.get(b) ?? 0) - (this.scores.get(a) ?? 0),
    );
  }

  async request(
    method: HttpMethod,
    path: string,
    body?: JsonValue | null,
    params: UrlParams = {},
  ): Promise<JsonObject> {
    const candidates = this.rankedNodes().slice(0, this.attemptLimit);
    const payload = body === undefined || body === null ? undefined : this.codec.encode(body);
    const suffix = buildSuffix(path, params);

    let lastError: TransportError | undefined;

    for (const node of candidates) {
      let status: number;
      let text: string;

      try {
        const response = await this.fetchImpl(`${node}${suffix}`, {
          method,
          headers: payload === undefined ? {} : { 'content-type': 'application/json' },
          body: payload,
          signal: AbortSignal.timeout(this.timeoutMs),
        });
        status = response.status;
        text = await response.text();
      } catch (err: unknown) {
        lastError = this.markFailed(node, describeTransportFailure(err), err);
        continue;
      }

      let decoded: JsonValue;
      try {
        decoded = await this.codec.decode(text);
      } catch (err: unknown) {
        lastError = this.markFailed(node, 'malformed response body', err);
        continue;
      }

      if (!isJsonObject(decoded)) {
        lastError = this.markFailed(node, 'response body is not a JSON object');
        continue;
      }

      const error = decoded['error'];
      if (error !== undefined && error !== null && error !== false && error !== '') {
        throw new StoreError(describeStoreError(error), status, decoded);
      }

      return decoded;
    }

    throw new NoNodesAvailable(candidates.length, lastError);
  }

  search(
    index: string,
    doctype: string,
    body: JsonObject,
    options: SearchOptions = {},
  ): Promise<JsonObject> {
    const params: Record<string, string | number> = {};
    // size 0 is sent so the store returns no hits instead of its default page
    if (options.size !== undefined && options.size !== null) params['size'] = options.size;
    if (options.offset) params['from'] = options.offset;
    if (options.orderBy) params['sort'] = toSortParam(options.orderBy);

    return this.request('POST', `/${index}/${doctype}/_search`, body, params);
  }

  get(index: string, doctype: string, id: string): Promise<JsonObject> {
    return this.request('GET', `/${index}/${doctype}/${encodeURIComponent(id)}`);
  }

  /** Indexes a document; PUT with an explicit id, POST to let the store assign one. */
  index(doc: JsonObject, index: string, doctype: string, id?: string | null): Promise<JsonObject> {
    if (id !== undefined && id !== null) {
      return this.request('PUT', `/${index}/${doctype}/${encodeURIComponent(id)}`, doc);
    }
    return this.request('POST', `/${index}/${doctype}/`, doc);
  }

  deleteById(index: string, doctype: string, id: string): Promise<JsonObject> {
    return this.request('DELETE', `/${index}/${doctype}/${encodeURIComponent(id)}`);
  }

  deleteByQuery(index: string, doctype: string, query: JsonObject): Promise<JsonObject> {
    return this.request('DELETE', `/${index}/${doctype}/_query`, query);
  }

  refresh(index?: string): Promise<JsonObject> {
    return this.request('POST', index ? `/${index}/_refresh` : '/_refresh');
  }

  optimize(index?: string): Promise<JsonObject> {
    return this.request('POST', index ? `/${index}/_optimize` : '/_optimize');
  }

  createIndex(index: string, mapping?: JsonObject): Promise<JsonObject> {
    return this.request('PUT', `/${index}`, mapping);
  }

  deleteIndex(index: string): Promise<JsonObject> {
    return this.request('DELETE', `/${index}`);
  }

  async close(): Promise<void> {
    await this.codec.close();
  }

  private markFailed(node: string, message: string, cause?: unknown): TransportError {
    this.scores.set(node, (this.scores.get(node) ?? 0) - 1);
    const error = new TransportError(node, message, cause === undefined ? undefined : { cause });
    this.log.warn(
      { err: error, node, score: this.scores.get(node) },
      'Store node request failed, trying next node',
    );
    return error;
  }
}

function buildSuffix(path: string, params: UrlParams): string {
  const normalized = path.startsWith('/') ? path : `/${path}`;
  const qs = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    qs.set(key, String(value));
  }
  const q = qs.toString();
  return q ? `${normalized}?${q}` : normalized;
}

function describeTransportFailure(err: unknown): string {
  if (err instanceof Error) {
    if (err.name === 'TimeoutError' || err.name === 'AbortError') return 'request timed out';
    return err.message;
  }
  return String(err);
}
