import Fastify, { FastifyInstance } from 'fastify';
import viewerStatePlugin from './plugins/viewer-state';
import dashboardRoutes from './routes/dashboard';
import sensorRoutes from './routes/sensors';
import readingsRoutes from './routes/readings';
import exportRoutes from './routes/export';
import internalStatsRoutes from './routes/internal-stats';
import { SnapshotStore } from './store/snapshot-store';

export interface BuildAppOptions {
    store: SnapshotStore;
    logger?: boolean;
}

export async function buildApp({ store, logger = true }: BuildAppOptions): Promise<FastifyInstance> {
    const fastify = Fastify({ logger });

    await fastify.register(viewerStatePlugin, { store });

    fastify.get('/health', async () => {
        return { ok: true };
    });

    fastify.register(dashboardRoutes, { prefix: '/api/v1/dashboard' });
    fastify.register(sensorRoutes, { prefix: '/api/v1' });
    fastify.register(readingsRoutes, { prefix: '/api/v1' });
    fastify.register(exportRoutes, { prefix: '/api/v1' });
    fastify.register(internalStatsRoutes, { prefix: '/api/v1/internal' });

    return fastify;
}
