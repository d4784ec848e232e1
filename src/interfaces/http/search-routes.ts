import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { searchEvents } from '../../application/index.js';
import { InvalidQueryUsage, NoNodesAvailable, StoreError } from '../../domain/index.js';

type QueryValue = string | string[] | undefined;

/** First value of a querystring parameter that may repeat. */
function first(value: QueryValue): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Parses a querystring value to an integer.
 * Returns `undefined` for missing values, `NaN` for anything else.
 */
function safeInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n) || n !== Math.floor(n)) return NaN;
  return n;
}

/**
 * Read-only search API.
 *
 * GET /api/v1/search   — free-text and field search, newest first, with facets
 * GET /api/v1/channels — channels being recorded
 */
async function searchRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * Query params: search, channel, user, limit, offset.
   * Without search text or filters every event is listed.
   */
  fastify.get(
    '/api/v1/search',
    async (
      request: FastifyRequest<{
        Querystring: {
          search?: QueryValue;
          channel?: QueryValue;
          user?: QueryValue;
          limit?: QueryValue;
          offset?: QueryValue;
        };
      }>,
      reply: FastifyReply,
    ) => {
      const q = request.query;

      const limit = safeInt(first(q.limit));
      const offset = safeInt(first(q.offset));

      if (limit !== undefined && Number.isNaN(limit)) {
        return reply.status(400).send({ error: 'limit must be an integer' });
      }
      if (offset !== undefined && Number.isNaN(offset)) {
        return reply.status(400).send({ error: 'offset must be an integer' });
      }

      const search = first(q.search);
      const channel = first(q.channel);
      const user = first(q.user);

      try {
        const result = await searchEvents(fastify.chatEvents, {
          ...(search !== undefined ? { search } : {}),
          ...(channel !== undefined ? { channel } : {}),
          ...(user !== undefined ? { user } : {}),
          ...(limit !== undefined ? { limit } : {}),
          ...(offset !== undefined ? { offset } : {}),
        });
        return reply.status(200).send(result);
      } catch (err: unknown) {
        if (err instanceof InvalidQueryUsage) {
          return reply.status(400).send({ error: err.message });
        }
        if (err instanceof StoreError || err instanceof NoNodesAvailable) {
          request.log.warn({ err }, 'Search against the document store failed');
          return reply.status(502).send({ error: 'Document store unavailable', detail: err.message });
        }
        throw err;
      }
    },
  );

  fastify.get(
    '/api/v1/channels',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send({ channels: fastify.chatChannels });
    },
  );
}

export default fp(searchRoutes, {
  name: 'search-routes',
  decorators: { fastify: ['chatEvents', 'chatChannels'] },
  fastify: '5.x',
});
