import { FastifyInstance } from 'fastify';

export default async function internalStatsRoutes(fastify: FastifyInstance) {
    fastify.get('/feed-stats', async () => {
        return fastify.feed.stats();
    });
}
