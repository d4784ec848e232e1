import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { chatCallbackSchema } from '../../application/index.js';
import type { ChatCallback } from '../../application/index.js';
import type { ChatEvent } from '../../domain/index.js';

/**
 * Registers the chat bridge routes.
 *
 * POST /api/v1/chat-events  — one connection callback from the bridge
 * GET  /api/v1/chat-replies — replies waiting to be sent, drained on read
 */
async function ingestRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * Validates → runs the matching recorder callback → returns 202.
   *
   * Delivery to the sinks is not awaited. For messages the response waits
   * until command replies are queued, so the bridge can collect them next.
   */
  fastify.post(
    '/api/v1/chat-events',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = chatCallbackSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const event = await record(fastify, parsed.data);

      return reply.status(202).send({
        status: 'accepted',
        recorded: event !== null,
        kind: event?.kind ?? null,
      });
    },
  );

  fastify.get(
    '/api/v1/chat-replies',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send({ replies: fastify.replies.drain() });
    },
  );
}

function record(fastify: FastifyInstance, input: ChatCallback): ChatEvent | null | Promise<ChatEvent | null> {
  const { recorder } = fastify;
  switch (input.callback) {
    case 'connect':
      return recorder.onConnect();
    case 'disconnect':
      return recorder.onDisconnect(input.reason);
    case 'join':
      return recorder.onJoin(input.channel);
    case 'message':
      return recorder.onMessage(input.user, input.channel, input.text);
    case 'action':
      return recorder.onAction(input.user, input.channel, input.text);
    case 'nick_change':
      return recorder.onNickChange(input.old_nick, input.new_nick);
    case 'user_joined':
      return recorder.onUserJoined(input.user, input.channel);
    case 'user_left':
      return recorder.onUserLeft(input.user, input.channel);
  }
}

export default fp(ingestRoutes, {
  name: 'ingest-routes',
  decorators: { fastify: ['recorder', 'replies'] },
  fastify: '5.x',
});
