import { describe, test, expect, beforeEach } from 'vitest';
import { SnapshotStore } from '../store/snapshot-store';
import { enriched, UNSAFE_EVERYTHING } from './fixtures';

describe('SnapshotStore', () => {
    let store: SnapshotStore;

    beforeEach(() => {
        store = new SnapshotStore({ trendWindow: 2, recentWindow: 3 });
    });

    test('summary before any data', () => {
        expect(store.summary()).toEqual({
            sensors: 0,
            overall_status: null,
            counts: { good: 0, moderate: 0, unsafe: 0 },
            last_timestamp: null,
            total_ingested: 0
        });
    });

    test('keeps the latest reading per sensor, sorted by id', () => {
        store.ingest(enriched({ sensor_id: 'SENSOR_B', timestamp: 't1' }));
        store.ingest(enriched({ sensor_id: 'SENSOR_A', timestamp: 't2' }));
        store.ingest(enriched({ sensor_id: 'SENSOR_B', timestamp: 't3', aqi: 120 }));

        expect(store.sensors().map(r => [r.sensor_id, r.timestamp])).toEqual([
            ['SENSOR_A', 't2'],
            ['SENSOR_B', 't3']
        ]);
        expect(store.latest('SENSOR_B')?.aqi).toBe(120);
        expect(store.latest('SENSOR_Z')).toBeUndefined();
    });

    test('summary rolls up each sensor\'s latest status', () => {
        store.ingest(enriched({ sensor_id: 'SENSOR_A', timestamp: 't1', ...UNSAFE_EVERYTHING }));
        store.ingest(enriched({ sensor_id: 'SENSOR_B', timestamp: 't2', overall_status: 'moderate' }));
        store.ingest(enriched({ sensor_id: 'SENSOR_A', timestamp: 't3' }));

        expect(store.summary()).toEqual({
            sensors: 2,
            overall_status: 'moderate',
            counts: { good: 1, moderate: 1, unsafe: 0 },
            last_timestamp: 't3',
            total_ingested: 3
        });
    });

    test('trends keep only the newest points per metric', () => {
        store.ingest(enriched({ timestamp: 't1', aqi: 10, humidity_pct: 40 }));
        store.ingest(enriched({ timestamp: 't2', aqi: 20, humidity_pct: 50 }));
        store.ingest(enriched({ timestamp: 't3', aqi: 30, humidity_pct: 60 }));

        expect(store.trend('SENSOR_A', 'aqi')).toEqual([
            { timestamp: 't2', value: 20 },
            { timestamp: 't3', value: 30 }
        ]);
        expect(store.allTrends('SENSOR_A')?.humidity_pct).toEqual([
            { timestamp: 't2', value: 50 },
            { timestamp: 't3', value: 60 }
        ]);
        expect(store.trend('SENSOR_Z', 'aqi')).toBeUndefined();
        expect(store.allTrends('SENSOR_Z')).toBeUndefined();
    });

    test('recent is newest first and bounded by the window', () => {
        for (const ts of ['t1', 't2', 't3', 't4']) {
            store.ingest(enriched({ timestamp: ts }));
        }
        expect(store.windowSize).toBe(3);
        expect(store.recent(2).map(r => r.timestamp)).toEqual(['t4', 't3']);
        expect(store.recent(10).map(r => r.timestamp)).toEqual(['t4', 't3', 't2']);
        expect(store.recent(0)).toEqual([]);
        expect(store.window().map(r => r.timestamp)).toEqual(['t2', 't3', 't4']);
    });

    test('clear forgets everything', () => {
        store.ingest(enriched());
        store.clear();
        expect(store.sensors()).toEqual([]);
        expect(store.window()).toEqual([]);
        expect(store.summary().total_ingested).toBe(0);
    });
});
