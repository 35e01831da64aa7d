import { FastifyInstance } from 'fastify';
import { statusBanner } from '../alerts/build-alerts';

export default async function dashboardRoutes(fastify: FastifyInstance) {
    // GET /summary
    fastify.get('/summary', async () => {
        const summary = fastify.snapshots.summary();
        return {
            ...summary,
            banner: statusBanner(summary.overall_status)
        };
    });
}
