import { FastifyInstance } from 'fastify';
import { READING_METRICS, isReadingMetric } from '@airwatch/contracts';
import { buildAlerts } from '../alerts/build-alerts';

interface SensorParams {
    id: string;
}

interface TrendQuery {
    metric?: string;
}

export default async function sensorRoutes(fastify: FastifyInstance) {
    // GET /sensors: latest reading per sensor
    fastify.get('/sensors', async () => {
        return { sensors: fastify.snapshots.sensors() };
    });

    // GET /sensors/:id/latest
    fastify.get<{ Params: SensorParams }>('/sensors/:id/latest', async (request, reply) => {
        const latest = fastify.snapshots.latest(request.params.id);
        if (!latest) {
            return reply.code(404).send({ error: 'Sensor not found' });
        }
        return latest;
    });

    // GET /sensors/:id/trend?metric=aqi
    fastify.get<{ Params: SensorParams; Querystring: TrendQuery }>('/sensors/:id/trend', async (request, reply) => {
        const { id } = request.params;
        const { metric } = request.query;

        if (metric !== undefined && !isReadingMetric(metric)) {
            return reply.code(400).send({
                error: `Unknown metric "${metric}", expected one of ${READING_METRICS.join(', ')}`
            });
        }

        if (metric === undefined) {
            const trends = fastify.snapshots.allTrends(id);
            if (!trends) {
                return reply.code(404).send({ error: 'Sensor not found' });
            }
            return { sensor_id: id, trends };
        }

        const points = fastify.snapshots.trend(id, metric);
        if (!points) {
            return reply.code(404).send({ error: 'Sensor not found' });
        }
        return { sensor_id: id, metric, points };
    });

    // GET /sensors/:id/alerts
    fastify.get<{ Params: SensorParams }>('/sensors/:id/alerts', async (request, reply) => {
        const latest = fastify.snapshots.latest(request.params.id);
        if (!latest) {
            return reply.code(404).send({ error: 'Sensor not found' });
        }
        return {
            sensor_id: latest.sensor_id,
            timestamp: latest.timestamp,
            overall_status: latest.overall_status,
            alerts: buildAlerts(latest)
        };
    });
}
