import { pino } from 'pino';

import { loadConfig } from './infrastructure/index.js';
import { buildServer } from './server.js';

/**
 * Bootstrap.
 *
 * Order:
 * 1) Config (file, then environment overrides)
 * 2) Root logger
 * 3) Fastify with store, pipeline and routes
 * 4) Shutdown on SIGINT/SIGTERM, flushing buffered sinks
 * 5) listen()
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const log = pino({ level: config.logging.level });

  log.info(
    { nodes: config.store.nodes, channels: config.chat.channels, logDirectory: config.logging.directory },
    'Config loaded',
  );

  const fastify = await buildServer({ config, log });

  const shutdown = async (signal: string): Promise<void> => {
    log.info({ signal }, 'Shutting down');
    await fastify.close();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        log.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }

  await fastify.listen({
    host: config.server.host,
    port: config.server.port,
  });
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
