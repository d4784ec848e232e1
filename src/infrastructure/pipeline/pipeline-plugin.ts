import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { ChatEventRecorder, EventDispatcher, ReplyOutbox } from '../../application/index.js';
import type { ChatscribeConfig } from '../config.js';
import type { Sink } from '../sinks/index.js';
import { BufferedSink, ConsoleSink, MultiChannelFileSink, StoreSink } from '../sinks/index.js';

export interface PipelinePluginOptions {
  config: ChatscribeConfig;
  log: Logger;
}

/**
 * Fastify plugin that assembles the recording pipeline.
 *
 * Sinks, in dispatch order: console, buffered per-channel files, buffered
 * store. Decorates `fastify.recorder`, `fastify.replies` and
 * `fastify.chatChannels`. On close the buffered sinks stop their timers
 * and flush once more.
 */
async function pipelinePlugin(fastify: FastifyInstance, options: PipelinePluginOptions): Promise<void> {
  const { config, log } = options;
  const flush = { intervalMs: config.logging.flush_interval_ms };

  const fileSink = new BufferedSink(
    new MultiChannelFileSink({
      directory: config.logging.directory,
      channels: config.chat.channels,
      systemRotateLength: config.logging.system_rotate_bytes,
      systemRotatedFiles: config.logging.system_rotated_files,
    }),
    log,
    flush,
  );
  const storeSink = new BufferedSink(new StoreSink(fastify.chatEvents), log, flush);

  const sinks: Sink[] = [new ConsoleSink(log.child({ component: 'chat' })), fileSink, storeSink];
  const dispatcher = new EventDispatcher(sinks, log);
  const replies = new ReplyOutbox(log);

  const recorder = new ChatEventRecorder({
    nickname: config.chat.nickname,
    origin: config.chat.origin,
    ignored: config.chat.ignored,
    dispatcher,
    log,
    commands: { search: fastify.chatEvents, replier: replies },
  });

  fileSink.start();
  storeSink.start();
  log.info({ sinks: dispatcher.sinkNames, channels: config.chat.channels }, 'Recording pipeline started');

  fastify.decorate('recorder', recorder);
  fastify.decorate('replies', replies);
  fastify.decorate('chatChannels', [...config.chat.channels]);

  fastify.addHook('onClose', async () => {
    await recorder.settled();
    await dispatcher.close();
    log.info('Recording pipeline stopped');
  });
}

export default fp(pipelinePlugin, {
  name: 'pipeline',
  dependencies: ['store'],
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    recorder: ChatEventRecorder;
    replies: ReplyOutbox;
    chatChannels: readonly string[];
  }
}
