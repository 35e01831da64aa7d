import { FastifyInstance } from 'fastify';

interface RecentQuery {
    limit?: string;
}

const DEFAULT_LIMIT = 20;

export default async function readingsRoutes(fastify: FastifyInstance) {
    // GET /readings/recent?limit=20: newest first
    fastify.get<{ Querystring: RecentQuery }>('/readings/recent', async (request) => {
        const requested = Number(request.query.limit ?? DEFAULT_LIMIT);
        const base = Number.isFinite(requested) ? Math.floor(requested) : DEFAULT_LIMIT;
        const limit = Math.min(Math.max(base, 1), fastify.snapshots.windowSize);

        return { limit, readings: fastify.snapshots.recent(limit) };
    });
}
