import { RecordConsumer, RecordProducer } from '@airwatch/bus';
import { EnrichedReadingV1, ReadingV1 } from '@airwatch/contracts';
import { enrichReading } from './status/classify';

export type ClassifierMetric = 'accepted' | 'rejected' | 'written' | 'write_failed';

export type ClassifierStats = Record<ClassifierMetric, number>;

export function createStats(): ClassifierStats {
    return {
        accepted: 0,
        rejected: 0,
        written: 0,
        write_failed: 0
    };
}

export interface RunClassifierOptions {
    source: RecordConsumer<ReadingV1>;
    sink: RecordProducer<EnrichedReadingV1>;
    signal?: AbortSignal;
    /** false: classify what is already there and return (batch reprocessing). */
    follow?: boolean;
    /** Counters are updated in place, so callers can read them while the loop runs. */
    stats?: ClassifierStats;
}

function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

/**
 * One delivery at a time: the write of record N is awaited before record N+1
 * is pulled, which keeps output order equal to input order.
 */
export async function runClassifier({
    source,
    sink,
    signal,
    follow = true,
    stats = createStats()
}: RunClassifierOptions): Promise<ClassifierStats> {
    for await (const delivery of source.consume({ follow, signal })) {
        if (delivery.kind === 'rejected') {
            stats.rejected++;
            console.warn(`[classifier] seq=${delivery.seq} status=rejected reason="${errorMessage(delivery.error.cause)}"`);
            continue;
        }

        stats.accepted++;
        const enriched = enrichReading(delivery.record);

        try {
            await sink.produce(enriched);
            stats.written++;
        } catch (e) {
            // Lost for this record only; the next one is still processed
            stats.write_failed++;
            console.error(`[classifier] seq=${delivery.seq} status=write_failed error="${errorMessage(e)}"`);
            continue;
        }

        console.log(
            `[classifier] seq=${delivery.seq} sensor=${enriched.sensor_id} status=${enriched.overall_status} ` +
            `aqi=${enriched.aqi} temp=${enriched.temperature_c} humidity=${enriched.humidity_pct}`
        );
    }

    return stats;
}
