import Fastify from 'fastify';
import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import type { Logger } from 'pino';

import { storePlugin, pipelinePlugin } from './infrastructure/index.js';
import type { ChatscribeConfig } from './infrastructure/index.js';
import type { FetchLike } from './infrastructure/store/index.js';
import { ingestRoutes, searchRoutes, healthRoutes } from './interfaces/http/index.js';

export interface BuildServerOptions {
  config: ChatscribeConfig;
  log: Logger;
  fetch?: FetchLike;
}

/**
 * Assembles the Fastify instance without listening.
 *
 * Order:
 * 1) Infrastructure plugins (store, then the pipeline that writes to it)
 * 2) HTTP routes
 */
export async function buildServer(options: BuildServerOptions): Promise<FastifyInstance> {
  const { config, log } = options;

  // widened so plugins and routes keep Fastify's default logger type
  const loggerInstance: FastifyBaseLogger = log;
  const fastify = Fastify({ loggerInstance });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(storePlugin, {
    store: config.store,
    log,
    ...(options.fetch ? { fetch: options.fetch } : {}),
  });
  await fastify.register(pipelinePlugin, { config, log });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(ingestRoutes);
  await fastify.register(searchRoutes);
  await fastify.register(healthRoutes);

  return fastify;
}
