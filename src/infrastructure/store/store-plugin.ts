import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import type { ChatscribeConfig } from '../config.js';
import { DocumentStoreClient } from './client.js';
import type { FetchLike } from './client.js';
import { JsonCodec } from './json-codec.js';
import { DocumentManager, IndexAdmin } from './manager.js';

export interface StorePluginOptions {
  store: ChatscribeConfig['store'];
  log: Logger;
  /** Replaces the global fetch; used by tests. */
  fetch?: FetchLike;
}

/**
 * Fastify plugin that owns the document store client.
 *
 * - Decorates `fastify.storeClient`, `fastify.chatEvents` and `fastify.chatIndex`.
 * - Terminates the decode worker on close.
 */
async function storePlugin(fastify: FastifyInstance, options: StorePluginOptions): Promise<void> {
  const { store, log } = options;

  const client = new DocumentStoreClient({
    nodes: store.nodes,
    log: log.child({ component: 'store' }),
    timeoutMs: store.timeout_ms,
    attemptLimit: store.attempt_limit,
    codec: new JsonCodec(store.decode_offload_bytes),
    ...(options.fetch ? { fetch: options.fetch } : {}),
  });
  const target = { index: store.index, doctype: store.doctype };

  fastify.decorate('storeClient', client);
  fastify.decorate('chatEvents', new DocumentManager(client, target));
  fastify.decorate('chatIndex', new IndexAdmin(client, target));

  log.info({ nodes: client.rankedNodes(), ...target }, 'Document store client ready');

  fastify.addHook('onClose', async () => {
    await client.close();
    log.info('Document store client closed');
  });
}

export default fp(storePlugin, {
  name: 'store',
  fastify: '5.x',
});

/** Extend Fastify's type system so the store decorators are available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    storeClient: DocumentStoreClient;
    chatEvents: DocumentManager;
    chatIndex: IndexAdmin;
  }
}
