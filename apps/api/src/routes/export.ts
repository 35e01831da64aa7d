import { FastifyInstance } from 'fastify';
import { toCsv } from '../utils/csv';

export const EXPORT_COLUMNS = [
    'timestamp',
    'sensor_id',
    'aqi',
    'temperature_c',
    'humidity_pct',
    'aqi_level',
    'temperature_level',
    'humidity_level',
    'overall_status'
] as const;

export default async function exportRoutes(fastify: FastifyInstance) {
    // GET /export.csv: retained window, oldest first
    fastify.get('/export.csv', async (_request, reply) => {
        const csv = toCsv(EXPORT_COLUMNS, fastify.snapshots.window());
        return reply
            .header('content-type', 'text/csv; charset=utf-8')
            .header('content-disposition', 'attachment; filename="env_monitor_export.csv"')
            .send(csv);
    });
}
