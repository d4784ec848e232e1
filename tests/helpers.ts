import { vi } from 'vitest';
import type { ChatEvent } from '../src/domain/index.js';
import { createEvent } from '../src/domain/index.js';

/** Fixed capture time: 2026-01-05T12:00:00.000Z. */
export const FIXED_TIME = Date.UTC(2026, 0, 5, 12, 0, 0);

export const TEST_ORIGIN = 'irc.test:6667';

/**
 * Factory for creating test events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeEvent(overrides: Partial<ChatEvent> = {}): ChatEvent {
  return createEvent({
    time: overrides.time ?? FIXED_TIME,
    actor: overrides.actor ?? 'alice',
    channel: overrides.channel === undefined ? '#general' : overrides.channel,
    kind: overrides.kind ?? 'MESSAGE',
    payload: overrides.payload === undefined ? 'hello' : overrides.payload,
    origin: overrides.origin ?? TEST_ORIGIN,
  });
}

export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as import('pino').Logger;
}

// ─── fake document store ─────────────────────────────────────

export interface RecordedRequest {
  url: string;
  method: string;
  body: unknown;
}

export type FakeHandler = (request: RecordedRequest) => Response | Promise<Response>;

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

/**
 * In-process stand-in for `fetch`. Every call is recorded with its JSON
 * body decoded; `handler` decides the response.
 */
export function fakeFetch(handler: FakeHandler) {
  const requests: RecordedRequest[] = [];
  const fetch = vi.fn(async (input: string, init: RequestInit): Promise<Response> => {
    const body: unknown = typeof init.body === 'string' ? JSON.parse(init.body) : undefined;
    const request = { url: input, method: init.method ?? 'GET', body };
    requests.push(request);
    return handler(request);
  });
  return { fetch, requests };
}

export interface SearchFixture {
  total?: number;
  took?: number;
  timedOut?: boolean;
  facets?: Record<string, Array<{ term: string; count: number }>>;
}

/** A search response carrying `sources` as hits `doc-1`, `doc-2`, … */
export function searchResponse(sources: Array<Record<string, unknown>>, fixture: SearchFixture = {}) {
  const body: Record<string, unknown> = {
    took: fixture.took ?? 3,
    timed_out: fixture.timedOut ?? false,
    hits: {
      total: fixture.total ?? sources.length,
      hits: sources.map((source, i) => ({ _id: `doc-${i + 1}`, _source: source })),
    },
  };
  if (fixture.facets) {
    const facets: Record<string, unknown> = {};
    for (const [field, terms] of Object.entries(fixture.facets)) {
      facets[field] = { _type: 'terms', terms };
    }
    body['facets'] = facets;
  }
  return body;
}
