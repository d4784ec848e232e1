import { describe, it, expect, vi } from 'vitest';
import { ConsoleSink, StoreSink } from '../../src/infrastructure/sinks/index.js';
import { DocumentManager, DocumentStoreClient } from '../../src/infrastructure/store/index.js';
import { NoNodesAvailable } from '../../src/domain/index.js';
import { fakeFetch, fakeLogger, jsonResponse, makeEvent } from '../helpers.js';

// ─── ConsoleSink ─────────────────────────────────────────────

describe('ConsoleSink', () => {
  it('logs the formatted line with event fields', async () => {
    const log = fakeLogger();
    await new ConsoleSink(log).log(makeEvent());

    expect(vi.mocked(log.info)).toHaveBeenCalledWith(
      { channel: '#general', actor: 'alice', kind: 'MESSAGE' },
      '[#general] 2026-01-05T12:00:00.000Z :  <alice> hello',
    );
  });
});

// ─── StoreSink ───────────────────────────────────────────────

describe('StoreSink', () => {
  const target = { index: 'chatevents', doctype: 'chatevent' };

  it('indexes the event as a document', async () => {
    const { fetch, requests } = fakeFetch(() => jsonResponse({ _id: 'x' }));
    const client = new DocumentStoreClient({ nodes: ['store:9200'], log: fakeLogger(), fetch });

    await new StoreSink(new DocumentManager(client, target)).log(makeEvent({ channel: null, kind: 'CONNECT', payload: null }));

    expect(requests[0]).toEqual({
      url: 'http://store:9200/chatevents/chatevent/',
      method: 'POST',
      body: { time: '2026-01-05T12:00:00.000Z', actor: 'alice', kind: 'CONNECT', origin: 'irc.test:6667' },
    });
  });

  it('fails the event when the store is unreachable', async () => {
    const { fetch } = fakeFetch(() => {
      throw new TypeError('fetch failed');
    });
    const client = new DocumentStoreClient({ nodes: ['store:9200'], log: fakeLogger(), fetch });

    await expect(new StoreSink(new DocumentManager(client, target)).log(makeEvent())).rejects.toBeInstanceOf(NoNodesAvailable);
  });
});
