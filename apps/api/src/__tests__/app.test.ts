import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { FastifyInstance } from 'fastify';
import { buildApp } from '../app';
import { SnapshotStore } from '../store/snapshot-store';
import { loadConfig } from '../config';
import { enriched, UNSAFE_EVERYTHING } from './fixtures';

describe('viewer API', () => {
    let store: SnapshotStore;
    let app: FastifyInstance;

    beforeEach(async () => {
        store = new SnapshotStore({ trendWindow: 10, recentWindow: 3 });
        app = await buildApp({ store, logger: false });
    });

    afterEach(async () => {
        await app.close();
    });

    test('GET /health', async () => {
        const res = await app.inject({ method: 'GET', url: '/health' });
        expect(res.statusCode).toBe(200);
        expect(res.json()).toEqual({ ok: true });
    });

    describe('dashboard', () => {
        test('waiting banner before any data', async () => {
            const res = await app.inject({ method: 'GET', url: '/api/v1/dashboard/summary' });
            expect(res.json()).toEqual({
                sensors: 0,
                overall_status: null,
                counts: { good: 0, moderate: 0, unsafe: 0 },
                last_timestamp: null,
                total_ingested: 0,
                banner: { label: 'WAITING FOR DATA', subtitle: 'No classified readings received yet' }
            });
        });

        test('worst sensor drives the banner', async () => {
            store.ingest(enriched({ sensor_id: 'SENSOR_A' }));
            store.ingest(enriched({ sensor_id: 'SENSOR_B', ...UNSAFE_EVERYTHING }));

            const body = (await app.inject({ method: 'GET', url: '/api/v1/dashboard/summary' })).json();
            expect(body.overall_status).toBe('unsafe');
            expect(body.banner.label).toBe('RISK DETECTED');
        });
    });

    describe('sensors', () => {
        beforeEach(() => {
            store.ingest(enriched({ sensor_id: 'SENSOR_B', timestamp: 't1', aqi: 40 }));
            store.ingest(enriched({ sensor_id: 'SENSOR_A', timestamp: 't2', ...UNSAFE_EVERYTHING }));
            store.ingest(enriched({ sensor_id: 'SENSOR_B', timestamp: 't3', aqi: 55 }));
        });

        test('lists the latest reading per sensor', async () => {
            const body = (await app.inject({ method: 'GET', url: '/api/v1/sensors' })).json();
            expect(body.sensors.map((s: { sensor_id: string }) => s.sensor_id)).toEqual(['SENSOR_A', 'SENSOR_B']);
        });

        test('latest for one sensor', async () => {
            const res = await app.inject({ method: 'GET', url: '/api/v1/sensors/SENSOR_B/latest' });
            expect(res.statusCode).toBe(200);
            expect(res.json()).toMatchObject({ sensor_id: 'SENSOR_B', timestamp: 't3', aqi: 55 });
        });

        test('unknown sensor is 404', async () => {
            const res = await app.inject({ method: 'GET', url: '/api/v1/sensors/SENSOR_Z/latest' });
            expect(res.statusCode).toBe(404);
            expect(res.json()).toEqual({ error: 'Sensor not found' });
        });

        test('trend for one metric', async () => {
            const res = await app.inject({ method: 'GET', url: '/api/v1/sensors/SENSOR_B/trend?metric=aqi' });
            expect(res.json()).toEqual({
                sensor_id: 'SENSOR_B',
                metric: 'aqi',
                points: [{ timestamp: 't1', value: 40 }, { timestamp: 't3', value: 55 }]
            });
        });

        test('trend without a metric returns all three', async () => {
            const body = (await app.inject({ method: 'GET', url: '/api/v1/sensors/SENSOR_A/trend' })).json();
            expect(body.trends).toEqual({
                aqi: [{ timestamp: 't2', value: 180 }],
                temperature_c: [{ timestamp: 't2', value: 41.5 }],
                humidity_pct: [{ timestamp: 't2', value: 85 }]
            });
        });

        test('unknown metric is 400', async () => {
            const res = await app.inject({ method: 'GET', url: '/api/v1/sensors/SENSOR_A/trend?metric=pm25' });
            expect(res.statusCode).toBe(400);
            expect(res.json()).toEqual({ error: 'Unknown metric "pm25", expected one of aqi, temperature_c, humidity_pct' });
        });

        test('trend for an unknown sensor is 404', async () => {
            const res = await app.inject({ method: 'GET', url: '/api/v1/sensors/SENSOR_Z/trend?metric=aqi' });
            expect(res.statusCode).toBe(404);
        });

        test('alerts for the latest reading', async () => {
            const body = (await app.inject({ method: 'GET', url: '/api/v1/sensors/SENSOR_A/alerts' })).json();
            expect(body.overall_status).toBe('unsafe');
            expect(body.alerts.map((a: { title: string }) => a.title)).toEqual([
                'UNSAFE AIR QUALITY - AQI 180',
                'EXTREME HEAT RISK - 41.5°C',
                'HIGH MOISTURE ALERT - 85%'
            ]);
        });
    });

    describe('recent readings', () => {
        beforeEach(() => {
            for (const ts of ['t1', 't2', 't3', 't4']) {
                store.ingest(enriched({ timestamp: ts }));
            }
        });

        test('newest first, limited', async () => {
            const body = (await app.inject({ method: 'GET', url: '/api/v1/readings/recent?limit=2' })).json();
            expect(body.limit).toBe(2);
            expect(body.readings.map((r: { timestamp: string }) => r.timestamp)).toEqual(['t4', 't3']);
        });

        test.each([
            ['999', 3],
            ['0', 1],
            ['abc', 3]
        ])('limit=%s is clamped to %s', async (limit, expected) => {
            const body = (await app.inject({ method: 'GET', url: `/api/v1/readings/recent?limit=${limit}` })).json();
            expect(body.limit).toBe(expected);
        });
    });

    test('CSV export of the retained window', async () => {
        store.ingest(enriched({ sensor_id: 'SENSOR_A', timestamp: '2026-05-01T10:00:00.000Z', ...UNSAFE_EVERYTHING }));

        const res = await app.inject({ method: 'GET', url: '/api/v1/export.csv' });

        expect(res.statusCode).toBe(200);
        expect(res.headers['content-type']).toBe('text/csv; charset=utf-8');
        expect(res.headers['content-disposition']).toBe('attachment; filename="env_monitor_export.csv"');
        expect(res.body).toBe(
            'timestamp,sensor_id,aqi,temperature_c,humidity_pct,aqi_level,temperature_level,humidity_level,overall_status\r\n' +
            '2026-05-01T10:00:00.000Z,SENSOR_A,180,41.5,85,unsafe,heat_risk,high_moisture,unsafe\r\n'
        );
    });

    test('feed stats before the feed starts', async () => {
        const res = await app.inject({ method: 'GET', url: '/api/v1/internal/feed-stats' });
        expect(res.json()).toEqual({ running: false, accepted: 0, rejected: 0, resets: 0, last_accepted_at: null });
    });
});

describe('loadConfig', () => {
    test('defaults', () => {
        expect(loadConfig({})).toEqual({
            port: 3000,
            host: '0.0.0.0',
            feed: { kind: 'file', path: 'data/processed_data.jsonl', pollIntervalMs: 3000 },
            trendWindow: 60,
            recentWindow: 60
        });
    });

    test('queue feed', () => {
        expect(loadConfig({ BUS: 'queue', PORT: '8080' }).feed).toEqual({
            kind: 'queue',
            redisUrl: 'redis://localhost:6379',
            queueName: 'enriched_readings_v1'
        });
    });
});
