import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

/**
 * GET /api/v1/health — node failure scores, in the order the next store
 * request will try them. Reports `degraded` once any node has failed.
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    '/api/v1/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const scores = fastify.storeClient.nodeScores();
      const nodes = fastify.storeClient.rankedNodes().map((node) => ({
        node,
        score: scores.get(node) ?? 0,
      }));
      const degraded = nodes.some((entry) => entry.score < 0);

      return reply.status(200).send({ status: degraded ? 'degraded' : 'ok', nodes });
    },
  );
}

export default fp(healthRoutes, {
  name: 'health-routes',
  decorators: { fastify: ['storeClient'] },
  fastify: '5.x',
});
