import {
    READING_METRICS,
    EnrichedReadingV1,
    ReadingMetric,
    Severity,
    compareSeverity
} from '@airwatch/contracts';
import { RingBuffer } from './ring-buffer';

export interface TrendPoint {
    timestamp: string | number;
    value: number;
}

export type SensorTrends = Record<ReadingMetric, TrendPoint[]>;

export interface DashboardSummary {
    sensors: number;
    /** Worst overall status across each sensor's latest reading; null before any data. */
    overall_status: Severity | null;
    counts: Record<Severity, number>;
    last_timestamp: string | number | null;
    total_ingested: number;
}

export interface SnapshotStoreOptions {
    /** Points kept per sensor per metric. */
    trendWindow: number;
    /** Most recent readings kept across all sensors. */
    recentWindow: number;
}

/**
 * Viewer read model, refreshed as the feed delivers records.
 * Memory is bounded by the windows times the (small, fixed) number of sensors.
 */
export class SnapshotStore {
    private readonly latestBySensor = new Map<string, EnrichedReadingV1>();
    private readonly trends = new Map<string, Record<ReadingMetric, RingBuffer<TrendPoint>>>();
    private readonly recentWindow: RingBuffer<EnrichedReadingV1>;
    private ingested = 0;

    constructor(private readonly options: SnapshotStoreOptions) {
        this.recentWindow = new RingBuffer<EnrichedReadingV1>(options.recentWindow);
    }

    get windowSize(): number {
        return this.recentWindow.capacity;
    }

    ingest(record: EnrichedReadingV1): void {
        this.latestBySensor.set(record.sensor_id, record);

        let trends = this.trends.get(record.sensor_id);
        if (!trends) {
            trends = {
                aqi: new RingBuffer<TrendPoint>(this.options.trendWindow),
                temperature_c: new RingBuffer<TrendPoint>(this.options.trendWindow),
                humidity_pct: new RingBuffer<TrendPoint>(this.options.trendWindow)
            };
            this.trends.set(record.sensor_id, trends);
        }
        for (const metric of READING_METRICS) {
            trends[metric].push({ timestamp: record.timestamp, value: record[metric] });
        }

        this.recentWindow.push(record);
        this.ingested++;
    }

    latest(sensorId: string): EnrichedReadingV1 | undefined {
        return this.latestBySensor.get(sensorId);
    }

    sensors(): EnrichedReadingV1[] {
        return [...this.latestBySensor.values()].sort((a, b) => a.sensor_id.localeCompare(b.sensor_id));
    }

    trend(sensorId: string, metric: ReadingMetric): TrendPoint[] | undefined {
        return this.trends.get(sensorId)?.[metric].toArray();
    }

    allTrends(sensorId: string): SensorTrends | undefined {
        const trends = this.trends.get(sensorId);
        if (!trends) return undefined;
        return {
            aqi: trends.aqi.toArray(),
            temperature_c: trends.temperature_c.toArray(),
            humidity_pct: trends.humidity_pct.toArray()
        };
    }

    /** Newest first. */
    recent(limit: number): EnrichedReadingV1[] {
        if (limit < 1) return [];
        return this.recentWindow.toArray().slice(-limit).reverse();
    }

    /** Oldest first, the whole retained window. */
    window(): EnrichedReadingV1[] {
        return this.recentWindow.toArray();
    }

    summary(): DashboardSummary {
        const counts: Record<Severity, number> = { good: 0, moderate: 0, unsafe: 0 };
        let worst: Severity | null = null;

        for (const record of this.latestBySensor.values()) {
            counts[record.overall_status]++;
            if (worst === null || compareSeverity(record.overall_status, worst) > 0) {
                worst = record.overall_status;
            }
        }

        return {
            sensors: this.latestBySensor.size,
            overall_status: worst,
            counts,
            last_timestamp: this.recentWindow.latest()?.timestamp ?? null,
            total_ingested: this.ingested
        };
    }

    clear(): void {
        this.latestBySensor.clear();
        this.trends.clear();
        this.recentWindow.clear();
        this.ingested = 0;
    }
}
